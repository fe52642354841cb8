export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

// Levels later in LOG_LEVELS are more verbose; "silent" admits nothing.
export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);
  const channel =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (LOG_LEVELS.indexOf(messageLevel) <= threshold) {
        sink(`[repohealth] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: channel("error"),
    warn: channel("warn"),
    info: channel("info"),
    debug: channel("debug"),
  };
};

export const createSilentLogger = (): Logger => createStderrLogger("silent");

export const parseLogLevel = (value: string | undefined): LogLevel =>
  isLogLevel(value) ? value : "info";
