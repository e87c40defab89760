import { isCountedConversion, toPlayDetail } from '../engine/plays';
import { StatCalculator } from './types';

export const twoPointCalculator: StatCalculator = {
  name: 'two_point',
  init(ctx) {
    ctx.addStat('two_pt_attempts', 0);
    ctx.addStat('two_pt_conversions', 0);
    ctx.addStat('two_pt_rush_attempts', 0);
    ctx.addStat('two_pt_rush_conversions', 0);
    ctx.addStat('two_pt_pass_attempts', 0);
    ctx.addStat('two_pt_pass_conversions', 0);
  },
  accumulate(play, ctx) {
    const attempt = play.conversion;
    if (play.team !== ctx.team || attempt === null || attempt.kind === 'kick') return;
    if (!isCountedConversion(play)) return;

    ctx.incrementStat('two_pt_attempts');
    ctx.incrementStat(`two_pt_${attempt.kind}_attempts`);
    if (attempt.good) {
      ctx.incrementStat('two_pt_conversions');
      ctx.incrementStat(`two_pt_${attempt.kind}_conversions`);
    }
    ctx.recordDetail('two_pt_details', { ...toPlayDetail(play, ctx), scoring: attempt.good });
  },
};
