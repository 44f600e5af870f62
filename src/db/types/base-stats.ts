export type BaseStats = {
  maxHealth: number;
  attack: number;
  defense: number;
  agility: number;
  magic: number;
};

export const DEFAULT_BASE_STATS: BaseStats = {
  maxHealth: 20,
  attack: 5,
  defense: 3,
  agility: 4,
  magic: 2,
};
