import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { table } from 'table';

export class Logger {
  private verbose: boolean;
  private spinner: Ora | null = null;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  get isVerbose(): boolean {
    return this.verbose;
  }

  info(message: string): void {
    console.log(chalk.blue('ℹ'), message);
  }

  success(message: string): void {
    console.log(chalk.green('✓'), message);
  }

  error(message: string): void {
    console.error(chalk.red('✗'), message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow('⚠'), message);
  }

  debug(message: string): void {
    if (this.verbose) {
      console.log(chalk.gray('→'), message);
    }
  }

  startSpinner(message: string): void {
    this.spinner = ora(message).start();
  }

  updateSpinner(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
    }
  }

  succeedSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    }
  }

  failSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }

  warnSpinner(message?: string): void {
    if (this.spinner) {
      this.spinner.warn(message);
      this.spinner = null;
    }
  }

  stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  table(header: string[], rows: Array<Array<string | number>>): void {
    console.log(table([header.map(h => chalk.bold(h)), ...rows.map(r => r.map(String))]));
  }

  header(message: string): void {
    console.log();
    console.log(chalk.bold.cyan(message));
    console.log(chalk.cyan('━'.repeat(message.length)));
  }

  section(title: string, content: string): void {
    console.log();
    console.log(chalk.bold(title));
    console.log(content);
  }

  duration(seconds: number | undefined): string {
    if (seconds === undefined) {
      return chalk.gray('default');
    }
    const minutes = Math.floor(seconds / 60);
    const rest = Math.round(seconds % 60);
    return chalk.yellow(`${minutes}m ${rest}s`);
  }
}
