import type { Readable } from 'node:stream';

/**
 * Read piped input to the end.
 * Throws when the stream is an interactive terminal, since nothing would ever arrive.
 */
export async function readStdin(stdin: Readable & { isTTY?: boolean } = process.stdin): Promise<string> {
  if (stdin.isTTY) {
    throw new Error('No input piped to stdin. Use: echo "add 2 3" | calcline eval');
  }

  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    stdin.setEncoding('utf8');
    stdin.on('data', (chunk: string) => {
      chunks.push(chunk);
    });
    stdin.on('end', () => {
      resolve(chunks.join(''));
    });
    stdin.on('error', reject);
    // Ensure stdin is flowing
    stdin.resume();
  });
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
