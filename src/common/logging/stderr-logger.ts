import { ConsoleLogger, LogLevel } from '@nestjs/common';

// ConsoleLogger that writes every level to stderr, leaving stdout to
// command output such as the --json document.
export class StderrLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context = '', logLevel: LogLevel = 'log'): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
