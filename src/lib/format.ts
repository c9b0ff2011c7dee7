import chalk from "chalk";

const LABEL_WIDTH = 14;

/**
 * Terminal output for the licensekit commands
 */
export const fmt = {
  section(title: string): string {
    return `\n${chalk.bold.cyan(title)}\n${chalk.dim("-".repeat(title.length))}`;
  },

  field(label: string, value: string): string {
    return `${chalk.dim(label.padEnd(LABEL_WIDTH))}${value}`;
  },

  /** "VALID <file>" or "INVALID <file>" */
  verdict(valid: boolean, subject: string): string {
    return valid ? `${chalk.bgGreen.black(" VALID ")} ${subject}` : `${chalk.bgRed.white(" INVALID ")} ${subject}`;
  },

  written(what: string, path: string): string {
    return `${chalk.green("wrote")} ${what} ${chalk.underline(path)}`;
  },

  notice(message: string): string {
    return chalk.yellow(`note: ${message}`);
  },

  failure(message: string): string {
    return `${chalk.red.bold("licensekit:")} ${message}`;
  },
};
