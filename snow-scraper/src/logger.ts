import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  detail(message: string): void;
}

export const log: Logger = {
  info: (message) => console.info(chalk.blue(message)),
  success: (message) => console.info(chalk.green(message)),
  warn: (message) => console.warn(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
  detail: (message) => console.info(chalk.gray(message)),
};
