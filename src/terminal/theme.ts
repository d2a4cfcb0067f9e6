import { Chalk, supportsColor } from "chalk";

export type Theme = {
  prompt: (text: string) => string;
  hint: (text: string) => string;
  key: (text: string) => string;
  warning: (text: string) => string;
  selected: (text: string) => string;
  muted: (text: string) => string;
  accent: (text: string) => string;
  error: (text: string) => string;
};

export function createTheme(color: boolean): Theme {
  const level = color && supportsColor ? supportsColor.level : 0;
  const chalk = new Chalk({ level });
  return {
    prompt: (text) => chalk.cyan(text),
    hint: (text) => chalk.gray(text),
    key: (text) => chalk.cyan(text),
    warning: (text) => chalk.redBright(text),
    selected: (text) => chalk.bold.cyan(text),
    muted: (text) => chalk.dim(text),
    accent: (text) => chalk.bold.cyan(text),
    error: (text) => chalk.red(text),
  };
}

export const plainTheme: Theme = createTheme(false);
