import chalk from 'chalk';

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  ok(message: string): void;
  skip(message: string): void;
  dryRun(message: string): void;
  error(message: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    info: message => console.log(message),
    warn: message => console.log(chalk.yellow(`⚠  ${message}`)),
    ok: message => console.log(`${chalk.green.bold('[OK]')} ${message}`),
    skip: message => console.log(`${chalk.yellow.bold('[SKIP]')} ${message}`),
    dryRun: message => console.log(`${chalk.magenta.bold('[DRY-RUN]')} ${message}`),
    error: message => console.error(`${chalk.red.bold('[ERROR]')} ${chalk.red(message)}`)
  };
}

export interface PausableSpinner {
  isSpinning: boolean;
  clear(): unknown;
  render(): unknown;
}

/**
 * Wraps a reporter so every line is written with the active spinner cleared,
 * then redraws the spinner beneath it.
 */
export function pauseSpinnerWhile(reporter: Reporter, activeSpinner: () => PausableSpinner | undefined): Reporter {
  const around = (write: (message: string) => void) => (message: string) => {
    const spinner = activeSpinner();
    if (!spinner?.isSpinning) {
      write(message);
      return;
    }
    spinner.clear();
    write(message);
    spinner.render();
  };
  return {
    info: around(reporter.info),
    warn: around(reporter.warn),
    ok: around(reporter.ok),
    skip: around(reporter.skip),
    dryRun: around(reporter.dryRun),
    error: around(reporter.error)
  };
}
