import chalk from 'chalk';

export const symbols = {
  success: chalk.green('✔'),
  info: chalk.cyan('ℹ'),
};

export function heading(title: string): void {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string): void {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

/** Status lines shared by the commands */
export const render = {
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
};
