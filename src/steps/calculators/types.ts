import type { Play, PlayDetail } from '../engine/types';

export type DetailKey = 'explosive_plays' | 'two_pt_details';

export type StatContext = {
  season: string;
  game_id: string;
  team: string;
  opponent: string;
  stats: Record<string, number>;
  details: Record<DetailKey, PlayDetail[]>;
  addStat: (key: string, value: number) => void;
  incrementStat: (key: string, by?: number) => void;
  recordDetail: (key: DetailKey, detail: PlayDetail) => void;
};

export type StatCalculator = {
  name: string;
  init?: (ctx: StatContext) => void;
  accumulate?: (play: Play, ctx: StatContext) => void;
  finalize?: (ctx: StatContext) => void;
};
