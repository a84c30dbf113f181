import { input } from '@inquirer/prompts';

/** Interactive prompts need a terminal on both ends. */
export function canPrompt(): boolean {
  return Boolean(process.stdin.isTTY && process.stderr.isTTY);
}

export async function promptReason(message: string): Promise<string> {
  const answer = await input(
    {
      message,
      validate: (value: string) => (value.trim() ? true : 'A reason is required')
    },
    { output: process.stderr }
  );
  return answer.trim();
}
