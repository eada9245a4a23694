import chalk from 'chalk';

export interface Colors {
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  gray: (s: string) => string;
  cyan: (s: string) => string;
  bold: (s: string) => string;
}

const plain: Colors = {
  red: (s) => s,
  yellow: (s) => s,
  green: (s) => s,
  gray: (s) => s,
  cyan: (s) => s,
  bold: (s) => s,
};

/**
 * chalk, or pass-through functions when color is disabled (`--no-color`)
 */
export function createColors(color: boolean | undefined): Colors {
  return color === false ? plain : chalk;
}
