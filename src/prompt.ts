import * as readline from "node:readline";
import { InterruptedError } from "./errors.js";
import type { Logger } from "./logger.js";

/** Ask a yes/no question; resolves false for anything but an explicit yes. */
export type Confirm = (question: string) => Promise<boolean>;

export const denyAll: Confirm = async () => false;
export const approveAll: Confirm = async () => true;

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Prompt on the controlling terminal. Without a TTY on stdin the question is
 * answered "no" rather than waiting forever; Ctrl-C rejects with
 * `InterruptedError`, and end of input counts as "no".
 */
export function createTerminalConfirm(
  logger: Logger,
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Confirm {
  return async (question) => {
    if (!input.isTTY) {
      logger.warning(`${question} → no terminal attached, answering No.`);
      return false;
    }
    const rl = readline.createInterface({ input, output });
    const answer = await new Promise<string>((resolve, reject) => {
      let settled = false;
      // In terminal mode readline receives Ctrl-C instead of the process.
      rl.once("SIGINT", () => {
        settled = true;
        rl.close();
        reject(new InterruptedError());
      });
      rl.once("close", () => {
        if (!settled) resolve("");
      });
      rl.question(`${question} [y/N] `, (reply) => {
        settled = true;
        resolve(reply);
      });
    });
    rl.close();
    return isAffirmative(answer);
  };
}
