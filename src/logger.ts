import chalk from "chalk";

/**
 * Console output of the engine. Only safe messages go through the levelled
 * methods; raw command output and stack traces go through `debug`, which is
 * silent unless `FLEETWRIGHT_DEBUG` is set or `enableDebug()` was called.
 */
export class Logger {
  private static debugEnabled = Boolean(process.env.FLEETWRIGHT_DEBUG);

  static enableDebug(): void {
    Logger.debugEnabled = true;
  }

  static get isDebugEnabled(): boolean {
    return Logger.debugEnabled;
  }

  static info(message: string): void {
    console.log(chalk.blue(message));
  }

  static success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  static warning(message: string): void {
    console.log(chalk.yellow(`⚠ ${message}`));
  }

  static error(message: string): void {
    console.error(chalk.red(`✖ ${message}`));
  }

  static step(step: number, total: number, message: string): void {
    console.log(chalk.cyan(`[${step}/${total}] ${message}`));
  }

  /**
   * Traces a lifecycle hook as `<scope>.<hook>() called for <name>`.
   * Error hooks are printed as warnings.
   */
  static hook(scope: string, hook: string, serviceName: string): void {
    const message = `${scope}.${hook}() called for ${serviceName}`;
    if (hook.endsWith("Error")) {
      Logger.warning(message);
    } else {
      Logger.info(message);
    }
  }

  static debug(message: string): void {
    if (Logger.debugEnabled) {
      console.error(chalk.gray(message));
    }
  }
}
