import { createInterface } from "node:readline/promises";

export type Confirm = (question: string) => Promise<boolean>;

export const confirmOnTerminal: Confirm = async (question) => {
  // No terminal: the default answer applies
  if (!process.stdin.isTTY) {
    return false;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N]: `);
    return answer.trim().toLowerCase().startsWith("y");
  } finally {
    rl.close();
  }
};
