import chalk from 'chalk';
import path from 'path';

export type Status = 'error' | 'warning';

function statusLabel(status: Status): string {
  switch (status) {
    case 'error':
      return chalk.red('error');
    case 'warning':
      return chalk.yellow('warning');
  }
}

export function printFileHeader(fileRelPath: string) {
  const cwd = process.cwd();
  const absPath = path.resolve(cwd, fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  console.log(chalk.underline(link));
}

export function printValidationRow(level: Status, message: string) {
  console.log(`  ${statusLabel(level)}  ${message}`);
}

export function summaryLine(errors: number, warnings: number, profiles: number): string {
  const okMark = errors === 0 ? chalk.green('✓') : chalk.red('✖');
  const errTxt = errors === 1 ? '1 error' : `${errors} errors`;
  const warnTxt = warnings === 1 ? '1 warning' : `${warnings} warnings`;
  const profileTxt = profiles === 1 ? '1 database profile' : `${profiles} database profiles`;

  const coloredErr = errors > 0 ? chalk.red(errTxt) : chalk.green(errTxt);
  const coloredWarn = warnings > 0 ? chalk.yellow(warnTxt) : warnTxt;

  // "X errors and Y warnings in Z database profiles."
  return `${okMark} ${coloredErr} and ${coloredWarn} in ${profileTxt}.`;
}

export function printSummary(errors: number, warnings: number, profiles: number) {
  console.log(summaryLine(errors, warnings, profiles));
}
