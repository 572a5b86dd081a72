import chalk from "chalk";

let debugEnabled = false;

export function setDebug(enabled: boolean) {
  debugEnabled = enabled;
}

export const logger = {
  debug(...args: unknown[]) {
    if (debugEnabled) {
      console.debug(chalk.dim("[DEBUG]"), ...args);
    }
  },
  info(...args: unknown[]) {
    console.info(...args);
  },
  warn(...args: unknown[]) {
    console.warn(chalk.yellow("[WARN]"), ...args);
  },
  error(...args: unknown[]) {
    console.error(chalk.red("[ERROR]"), ...args);
  },
  command(command: string[]) {
    console.info(chalk.cyan("CMD:"), command.join(" "));
  },
};
