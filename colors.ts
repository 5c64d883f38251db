import chalk from "chalk";

export const c = {
  info: chalk.cyanBright,
  success: chalk.greenBright,
  warn: chalk.yellowBright,
  error: chalk.redBright,
  gray: chalk.gray,
  bold: chalk.bold,
  title: chalk.magentaBright.bold
};
