import { isFourthDownConverted, isGoForIt } from '../engine/plays';
import { StatCalculator } from './types';

// Punts and field-goal tries on fourth down are not attempts.
export const fourthDownCalculator: StatCalculator = {
  name: 'fourth_down',
  init(ctx) {
    ctx.addStat('fourth_down_attempts', 0);
    ctx.addStat('fourth_down_conversions', 0);
  },
  accumulate(play, ctx) {
    if (play.team !== ctx.team || play.is_negated || !isGoForIt(play)) return;
    ctx.incrementStat('fourth_down_attempts');
    if (isFourthDownConverted(play)) {
      ctx.incrementStat('fourth_down_conversions');
    }
  },
};
