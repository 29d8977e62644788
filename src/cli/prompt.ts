/**
 * Terminal prompts for the operator
 */

import { createInterface } from "node:readline/promises";

export async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/**
 * Yes/no question, defaulting to no
 */
export async function confirm(question: string): Promise<boolean> {
  const answer = await ask(`${question} (y/N) `);
  return /^y(es)?$/i.test(answer.trim());
}
