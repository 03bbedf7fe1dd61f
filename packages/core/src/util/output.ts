export interface Output {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only emitted when the sink was created with `verbose`. */
  debug(message: string): void;
}

export interface WritableLike {
  write(chunk: string): unknown;
}

export interface StreamOutputOptions {
  stdout: WritableLike;
  stderr: WritableLike;
  verbose?: boolean;
}

export function createStreamOutput(options: StreamOutputOptions): Output {
  const line = (stream: WritableLike, message: string) => {
    stream.write(message.endsWith('\n') ? message : `${message}\n`);
  };

  return {
    info: (message) => line(options.stdout, message),
    warn: (message) => line(options.stderr, `warning: ${message}`),
    error: (message) => line(options.stderr, `error: ${message}`),
    debug: (message) => {
      if (options.verbose) line(options.stdout, message);
    }
  };
}

export const silentOutput: Output = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};

/** Collects lines in memory; used by tests and by callers that render later. */
export class BufferedOutput implements Output {
  readonly lines: Array<{ level: 'info' | 'warn' | 'error' | 'debug'; message: string }> = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  messages(level: 'info' | 'warn' | 'error' | 'debug'): string[] {
    return this.lines.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
