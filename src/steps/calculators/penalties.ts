import _ from 'lodash';
import type { PenaltyBreakdown, Play } from '../engine/types';
import { StatCalculator } from './types';

export function penaltyTypeKey(type: string): string {
  return _.upperCase(type) || 'UNKNOWN';
}

// Negated plays are walked as well: the foul that voided a play still counts.
export const penaltyCalculator: StatCalculator = {
  name: 'penalties',
  init(ctx) {
    ctx.addStat('penalties', 0);
    ctx.addStat('penalties_declined', 0);
    ctx.addStat('penalty_yards', 0);
  },
  accumulate(play, ctx) {
    play.penalties
      .filter((penalty) => penalty.team === ctx.team)
      .forEach((penalty) => {
        if (penalty.declined) {
          ctx.incrementStat('penalties_declined');
          return;
        }
        ctx.incrementStat('penalties');
        if (penalty.yards !== null) {
          ctx.incrementStat('penalty_yards', Math.abs(penalty.yards));
        }
      });
  },
};

export function buildPenaltyBreakdown(plays: Play[], team: string): PenaltyBreakdown {
  const breakdown: PenaltyBreakdown = {};
  plays
    .flatMap((play) => play.penalties)
    .filter((penalty) => penalty.team === team)
    .forEach((penalty) => {
      const key = penaltyTypeKey(penalty.type);
      const entry = breakdown[key] ?? { accepted: 0, declined: 0 };
      if (penalty.declined) entry.declined += 1;
      else entry.accepted += 1;
      breakdown[key] = entry;
    });
  return breakdown;
}
