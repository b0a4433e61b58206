export const DIRECTIONS = ['up', 'down', 'left', 'right', 'stop'] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type MotorCommand = 'F' | 'B' | 'L' | 'R' | 'S';

export const DIRECTION_COMMANDS: Record<Direction, MotorCommand> = {
  up: 'F',
  down: 'B',
  left: 'L',
  right: 'R',
  stop: 'S'
};
