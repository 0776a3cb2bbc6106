import { createInterface } from "node:readline";

export async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(question, resolve);
  });
  rl.close();

  return answer.trim().toLowerCase().startsWith("y");
}
