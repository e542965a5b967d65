import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

export async function promptInput(question: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}
