/**
 * Prompt - One-line confirmation from the terminal
 */

import readline from "readline";
import type { Prompt } from "../types.js";
import { AFFIRMATIVE_ANSWER } from "../constants.js";
import { InterruptedError } from "../errors.js";

/**
 * Create a prompt that reads one line from input. End of input resolves
 * with an empty answer; Ctrl-C rejects with InterruptedError. Waits
 * indefinitely for the operator.
 */
export function createLinePrompt(
  input?: NodeJS.ReadableStream,
  output?: NodeJS.WritableStream,
  terminal?: boolean
): Prompt {
  return (question) => {
    const rl = readline.createInterface({
      input: input ?? process.stdin,
      output: output ?? process.stdout,
      terminal,
    });

    return new Promise<string>((resolve, reject) => {
      rl.once("SIGINT", () => {
        reject(new InterruptedError());
        rl.close();
      });
      rl.once("close", () => resolve(""));
      rl.question(question, (answer) => {
        resolve(answer);
        rl.close();
      });
    });
  };
}

export const askLine: Prompt = createLinePrompt();

/**
 * Case-sensitive exact match against the affirmative token
 */
export function isAffirmative(answer: string): boolean {
  return answer === AFFIRMATIVE_ANSWER;
}

/**
 * Ask the question and report whether the operator confirmed
 */
export async function confirm(question: string, prompt: Prompt = askLine): Promise<boolean> {
  const answer = await prompt(question);
  return isAffirmative(answer);
}
