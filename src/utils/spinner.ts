import ora, { Ora } from 'ora';

export interface SpinnerOptions {
  text: string;
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
}

/**
 * Wraps a single ora spinner. Output goes to stderr so that machine-readable
 * results on stdout stay clean; a disabled manager does nothing at all.
 */
export class SpinnerManager {
  private spinner: Ora | null = null;

  constructor(private readonly enabled: boolean = true) {}

  start(options: SpinnerOptions): void {
    if (!this.enabled) return;
    if (this.spinner) {
      this.stop();
    }

    this.spinner = ora({
      text: options.text,
      color: options.color || 'cyan',
      stream: process.stderr,
    }).start();
  }

  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  warn(text: string): void {
    if (this.spinner) {
      this.spinner.warn(text);
      this.spinner = null;
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
