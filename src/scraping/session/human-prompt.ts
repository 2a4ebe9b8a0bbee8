/**
 * Human Prompt
 *
 * Blocks until the person at the terminal confirms they have finished
 * something in the visible browser (solving a CAPTCHA).
 */
import readline from "readline";

export interface HumanPrompt {
  waitForAcknowledgement(message: string): Promise<void>;
}

export class TerminalPrompt implements HumanPrompt {
  waitForAcknowledgement(message: string): Promise<void> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr,
    });

    return new Promise((resolve, reject) => {
      // Raw-mode terminals deliver Ctrl+C to readline instead of the process
      rl.on("SIGINT", () => {
        rl.close();
        reject(new Error("Interrupted while waiting for the CAPTCHA to be solved"));
      });
      rl.question(`${message} `, () => {
        rl.close();
        resolve();
      });
    });
  }
}
