import { explosivePlayCalculator } from './explosives';
import { fourthDownCalculator } from './fourth_down';
import { penaltyCalculator } from './penalties';
import { loadSchemaGroups } from './schema';
import { twoPointCalculator } from './two_point';
import { StatCalculator, StatContext } from './types';

export function buildScaffold(groupName: string, stats: string[] = []): StatCalculator {
  return {
    name: `scaffold_${groupName}`,
    finalize(ctx: StatContext) {
      stats.forEach((key) => {
        if (ctx.stats[key] === undefined) {
          ctx.addStat(key, 0);
        }
      });
    },
  };
}

export function buildCalculators(calculators?: StatCalculator[]): StatCalculator[] {
  if (calculators) {
    return calculators;
  }

  const groupScaffolds: StatCalculator[] = [];
  const groups = loadSchemaGroups();
  if (groups) {
    Object.entries(groups).forEach(([groupName, stats]) => {
      groupScaffolds.push(buildScaffold(groupName, stats));
    });
  }

  return [
    explosivePlayCalculator,
    fourthDownCalculator,
    twoPointCalculator,
    penaltyCalculator,
    ...groupScaffolds,
  ];
}

export { loadSchemaGroups, loadSchemaStats } from './schema';
export { buildPenaltyBreakdown } from './penalties';
export type { DetailKey, StatCalculator, StatContext } from './types';
