import readline from 'node:readline/promises';

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Ask a yes/no question. Anything other than "y" or "yes" is a no, and so is
 * input that ends before an answer arrives.
 */
export async function confirm(question: string, streams: PromptStreams = {}): Promise<boolean> {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
  });
  // Depending on the Node release, closing the input either leaves a pending
  // question unsettled or rejects it with an AbortError. Both read as "no".
  const closed = new Promise<string>((resolve) => {
    rl.once('close', () => resolve(''));
  });
  try {
    const answer = await Promise.race([rl.question(`${question} (y/N): `), closed]).catch((error: unknown) => {
      if (error instanceof Error && error.name === 'AbortError') return '';
      throw error;
    });
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Streams for a prompt. Under `--json` the question goes to stderr so stdout
 * carries only the JSON document.
 */
export function promptStreams(json: boolean): PromptStreams {
  return json ? { output: process.stderr } : {};
}
