/**
 * Progress Tracking
 * Spinner-backed progress and message hooks for split and restore
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { formatBytes, percentOf } from './utils.js';

/**
 * One spinner per file; its callbacks plug into splitFile/restoreFile
 */
export class TransferProgressHandler {
  private spinner: Ora;
  private lastMessage: string = '';

  constructor(label: string) {
    this.spinner = ora({ text: label, color: 'cyan' }).start();
  }

  /**
   * Get callbacks object for splitFile/restoreFile
   */
  public getCallbacks() {
    return {
      onProgress: this.onProgress.bind(this),
      onMessage: this.onMessage.bind(this),
    };
  }

  /**
   * Called after each chunk
   */
  private onProgress(bytesDone: number, bytesTotal: number): void {
    const percent = percentOf(bytesDone, bytesTotal);
    this.spinner.text =
      chalk.white(this.lastMessage) +
      chalk.gray(` ${formatBytes(bytesDone)}/${formatBytes(bytesTotal)}`) +
      chalk.yellow(` ${percent}%`);
  }

  /**
   * Called at coarse milestones
   */
  private onMessage(message: string): void {
    this.lastMessage = message;
    this.spinner.text = chalk.white(message);
  }

  succeed(text: string): void {
    this.spinner.succeed(chalk.green(text));
  }

  warn(text: string): void {
    this.spinner.warn(chalk.yellow(text));
  }

  fail(text: string): void {
    this.spinner.fail(chalk.red(text));
  }
}
