import chalk from 'chalk';

export const error = chalk.bold.red;
export const warning = chalk.bold.yellow;
export const success = chalk.bold.green;

export const header = chalk.bold.cyan;
export const label = chalk.bold.white;
export const muted = chalk.gray;
