/**
 * Opt-in console logger.
 *
 * Every message is prefixed so output from several boxes can be told apart.
 * Nothing is written unless the logger was created enabled.
 */
export class Logger {
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(enabled = false, prefix = '[textflow]') {
    this.enabled = enabled;
    this.prefix = prefix;
  }

  debug(message: string, ...details: unknown[]): void {
    if (!this.enabled) return;
    console.debug(`${this.prefix} ${message}`, ...details);
  }

  warn(message: string, ...details: unknown[]): void {
    if (!this.enabled) return;
    console.warn(`${this.prefix} ${message}`, ...details);
  }

  error(message: string, ...details: unknown[]): void {
    if (!this.enabled) return;
    console.error(`${this.prefix} ${message}`, ...details);
  }
}
