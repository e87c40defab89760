import { toPlayDetail } from '../engine/plays';
import { StatCalculator } from './types';

export const EXPLOSIVE_RUSH_YARDS = 15;
export const EXPLOSIVE_PASS_YARDS = 20;

export const explosivePlayCalculator: StatCalculator = {
  name: 'explosives',
  init(ctx) {
    ctx.addStat('explosive_rushes', 0);
    ctx.addStat('explosive_passes', 0);
  },
  accumulate(play, ctx) {
    if (play.team !== ctx.team || play.is_negated) return;
    if (play.kick !== null || play.conversion !== null) return;

    if (play.play_type === 'rush' && play.yards_gained >= EXPLOSIVE_RUSH_YARDS) {
      ctx.incrementStat('explosive_rushes');
    } else if (play.play_type === 'pass' && play.yards_gained >= EXPLOSIVE_PASS_YARDS) {
      ctx.incrementStat('explosive_passes');
    } else {
      return;
    }
    ctx.recordDetail('explosive_plays', toPlayDetail(play, ctx));
  },
};
