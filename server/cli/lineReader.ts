import inquirer from 'inquirer';
import { createInterface } from 'readline';
import type { LineReader } from './interactiveLoop';

type QuestionAnswer = {
  question: string;
};

export type LineInput = NodeJS.ReadableStream & { isTTY?: boolean };

export function createInquirerReader(): LineReader {
  return {
    async readLine(prompt: string): Promise<string | null> {
      const { question } = await inquirer.prompt<QuestionAnswer>([
        {
          type: 'input',
          name: 'question',
          message: prompt,
        },
      ]);
      return question;
    },
  };
}

/**
 * Reads piped input line by line without echoing a prompt, so stdout only
 * carries answers. Resolves to null once the stream has ended.
 */
export function createStreamReader(input: NodeJS.ReadableStream): LineReader {
  const lines = createInterface({ input, terminal: false, crlfDelay: Infinity })[Symbol.asyncIterator]();
  return {
    async readLine(): Promise<string | null> {
      const next = await lines.next();
      return next.done ? null : next.value;
    },
  };
}

export function createLineReader(input: LineInput = process.stdin): LineReader {
  return input.isTTY ? createInquirerReader() : createStreamReader(input);
}
