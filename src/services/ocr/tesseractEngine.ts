import { spawn } from 'child_process';
import { ImageTooLargeError, preprocessForOcr } from './imagePreprocessor';
import { detectDocumentKind, FailureAction, isAbortError, OcrDocument, OcrEngine, OcrEngineError, OcrResult } from './types';

export type CommandRunner = (
  command: string,
  args: string[],
  input: Buffer,
  signal?: AbortSignal
) => Promise<{ stdout: string; stderr: string; exitCode: number }>;

export const runCommand: CommandRunner = (command, args, input, signal) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal, stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    child.on('close', (code) =>
      resolve({
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        exitCode: code ?? -1,
      })
    );
    child.stdin.on('error', reject);
    child.stdin.end(input);
  });

export type TesseractEngineOptions = {
  binaryPath: string;
  language: string;
  run?: CommandRunner;
};

type TsvWord = { key: string; text: string; confidence: number };

/**
 * Parses `tesseract ... tsv` output. Words are grouped back into lines by block/paragraph/line
 * number; rows with confidence -1 are layout rows, not words.
 */
export function parseTesseractTsv(tsv: string): { text: string; confidence: number } {
  const words: TsvWord[] = [];
  for (const row of tsv.split('\n').slice(1)) {
    const cols = row.split('\t');
    if (cols.length < 12) continue;
    const confidence = Number(cols[10]);
    const text = cols.slice(11).join('\t').trim();
    if (!Number.isFinite(confidence) || confidence < 0 || text === '') continue;
    words.push({ key: `${cols[1]}.${cols[2]}.${cols[3]}.${cols[4]}`, text, confidence });
  }

  const lines: string[] = [];
  let currentKey: string | null = null;
  for (const word of words) {
    if (word.key !== currentKey) {
      lines.push(word.text);
      currentKey = word.key;
    } else {
      lines[lines.length - 1] += ` ${word.text}`;
    }
  }

  const confidence = words.length > 0 ? words.reduce((sum, w) => sum + w.confidence, 0) / words.length / 100 : 0;
  return { text: lines.join('\n'), confidence };
}

export function classifyTesseractError(error: unknown): FailureAction {
  if (isAbortError(error)) return 'abort';
  return 'skip';
}

export class TesseractEngine implements OcrEngine {
  readonly name = 'tesseract';
  private readonly run: CommandRunner;

  constructor(private readonly options: TesseractEngineOptions) {
    this.run = options.run ?? runCommand;
  }

  async recognize(document: OcrDocument, signal?: AbortSignal): Promise<OcrResult> {
    const kind = detectDocumentKind(document.bytes);
    if (kind === 'pdf' || kind === 'unknown') {
      throw new OcrEngineError(this.name, 'unsupported', `cannot read ${kind} document ${document.filename}`);
    }

    let image: Buffer;
    try {
      image = (await preprocessForOcr(document.bytes)).buffer;
    } catch (error) {
      if (error instanceof ImageTooLargeError) {
        throw new OcrEngineError(this.name, 'unsupported', error.message, { cause: error });
      }
      throw error;
    }

    let output: Awaited<ReturnType<CommandRunner>>;
    try {
      output = await this.run(
        this.options.binaryPath,
        ['stdin', 'stdout', '-l', this.options.language, 'tsv'],
        image,
        signal
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw new OcrEngineError(this.name, 'aborted', 'recognition cancelled', { cause: error });
      }
      throw new OcrEngineError(this.name, 'unavailable', error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (output.exitCode !== 0) {
      throw new OcrEngineError(this.name, 'transient', `exited with ${output.exitCode}: ${output.stderr.trim()}`);
    }

    const parsed = parseTesseractTsv(output.stdout);
    return { engine: this.name, text: parsed.text, confidence: parsed.confidence };
  }
}
