import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { CommandError } from "../core/errors.ts";
import { Logger } from "../logger.ts";

const execFileAsync = promisify(execFile);
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export type CommandRunner = (binary: string, args: string[], options?: CommandOptions) => Promise<string>;

export interface CommandOptions {
  /** Path exported as KUBECONFIG to the child process */
  kubeconfigPath?: string | null;
  /** Data written to the child's stdin */
  input?: string;
}

/**
 * Runs an external binary and resolves with its stdout. Any non-zero exit
 * becomes a `CommandError` whose safe message only names the command, while
 * stderr goes to the raw message.
 */
export async function runCommand(binary: string, args: string[], options: CommandOptions = {}): Promise<string> {
  const env = options.kubeconfigPath
    ? { ...process.env, KUBECONFIG: options.kubeconfigPath }
    : process.env;

  Logger.debug(`$ ${formatCommand(binary, args)}`);

  if (options.input !== undefined) {
    return runWithInput(binary, args, env, options.input);
  }

  try {
    const { stdout } = await execFileAsync(binary, args, { env, encoding: "utf8", maxBuffer: MAX_OUTPUT_BYTES });
    return stdout;
  } catch (err) {
    throw commandFailure(binary, args, err);
  }
}

/**
 * Command line as written to debug logs: the value of every `--set`
 * override is masked, since chart values carry tokens and passwords.
 */
export function formatCommand(binary: string, args: readonly string[]): string {
  const shown = args.map((arg, index) => {
    if (args[index - 1] !== "--set") {
      return arg;
    }
    const separator = arg.indexOf("=");
    return separator === -1 ? arg : `${arg.slice(0, separator)}=***`;
  });
  return [binary, ...shown].join(" ");
}

function runWithInput(binary: string, args: string[], env: NodeJS.ProcessEnv, input: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = execFile(binary, args, { env, encoding: "utf8", maxBuffer: MAX_OUTPUT_BYTES }, (err, stdout) => {
      if (err) {
        reject(commandFailure(binary, args, err));
        return;
      }
      resolve(stdout);
    });
    child.stdin?.end(input);
  });
}

function commandFailure(binary: string, args: string[], err: unknown): CommandError {
  const subcommand = args.slice(0, 2).join(" ");
  const raw = hasStderr(err) && err.stderr.length > 0
    ? err.stderr
    : err instanceof Error
      ? err.message
      : String(err);
  return new CommandError(`${binary} ${subcommand} failed`, raw);
}

function hasStderr(err: unknown): err is { stderr: string } {
  return typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string";
}
