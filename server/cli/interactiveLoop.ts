export interface LineReader {
  /** Resolves to null once input is exhausted. */
  readLine(prompt: string): Promise<string | null>;
}

export interface QuestionAnswerer {
  answer(question: string): Promise<string>;
}

export interface LoopIO {
  reader: LineReader;
  write: (line: string) => void;
}

export type LoopState = 'awaiting-input' | 'terminated';

export const EXIT_COMMAND = 'exit';
export const QUESTION_PROMPT = 'Your question:';
export const SEPARATOR = '-'.repeat(80);
export const GOODBYE = 'Goodbye!';
export const ANSWER_FAILED = 'Something went wrong while answering that question. Please try again.';

export function isExitCommand(line: string): boolean {
  return line.trim().toLowerCase() === EXIT_COMMAND;
}

/**
 * Read questions until `exit` (any case) or end of input, answering each one
 * in turn. Returns the final state.
 */
export async function runInteractiveLoop(io: LoopIO, answerer: QuestionAnswerer): Promise<LoopState> {
  let state: LoopState = 'awaiting-input';

  while (state === 'awaiting-input') {
    const line = await io.reader.readLine(QUESTION_PROMPT);
    if (line === null || isExitCommand(line)) {
      io.write(GOODBYE);
      state = 'terminated';
      continue;
    }

    const question = line.trim();
    if (!question) {
      continue;
    }

    try {
      io.write(await answerer.answer(question));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[coach-bot] Failed to answer question:', message);
      io.write(ANSWER_FAILED);
    }
    io.write(SEPARATOR);
  }

  return state;
}
