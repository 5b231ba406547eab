export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export interface LogSink {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

const consoleSink: LogSink = {
  writeStdout: (line) => console.log(line),
  writeStderr: (line) => console.error(line),
};

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

export interface ConsoleLoggerOptions {
  sink?: LogSink;
  timestamps?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const stamp = options.timestamps ?? true;
  const prefix = (level: string) => `${stamp ? `${ts()} ` : ""}${level}`;
  return {
    info(message) {
      sink.writeStdout(`${prefix("")}${message}`);
    },
    warn(message) {
      sink.writeStderr(`${prefix("[WARN] ")}${message}`);
    },
    error(message, err) {
      const detail = err ? ` ${err instanceof Error ? err.message : String(err)}` : "";
      sink.writeStderr(`${prefix("[ERROR] ")}${message}${detail}`);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
