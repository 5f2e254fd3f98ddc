export interface LogChannel {
  appendLine(line: string): void;
  dispose(): void;
}

export interface Disposable {
  dispose(): void;
}

export function createStreamLogChannel(
  stream: NodeJS.WritableStream = process.stderr,
  name = 'Lexivox',
): LogChannel {
  return {
    appendLine: (line: string) => {
      stream.write(`${name} ${line}\n`);
    },
    dispose: () => undefined,
  };
}

export class ExtensionLogger implements Disposable {
  private readonly channel: LogChannel;

  constructor(channel: LogChannel = createStreamLogChannel()) {
    this.channel = channel;
  }

  info(message: string): void {
    this.channel.appendLine(this.format('info', message));
  }

  warn(message: string): void {
    this.channel.appendLine(this.format('warn', message));
  }

  error(message: string, error?: unknown): void {
    const details = error instanceof Error ? `\n${error.name}: ${error.message}\n${error.stack ?? ''}` : '';
    this.channel.appendLine(this.format('error', `${message}${details}`));
  }

  event(name: string, data: Record<string, unknown>): void {
    this.channel.appendLine(this.formatEvent(name, data));
  }

  dispose(): void {
    this.channel.dispose();
  }

  private format(level: 'info' | 'warn' | 'error', message: string): string {
    const timestamp = new Date().toISOString();
    return `[${level.toUpperCase()} - ${timestamp}] ${message}`;
  }

  private formatEvent(name: string, data: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    return `[EVENT - ${timestamp}] ${name} ${this.safeStringify(data)}`;
  }

  private safeStringify(data: Record<string, unknown>): string {
    try {
      return JSON.stringify(data, undefined, 0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return JSON.stringify({ serializationError: message });
    }
  }
}
