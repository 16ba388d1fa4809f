import fs from 'fs/promises';
import { GameErrorCode, MoveFileError } from '../shared/errors';

/**
 * Moves file reader.
 *
 * A moves file holds one move per line in coordinate form, e.g. `e2e4`
 * (file letter, rank digit, file letter, rank digit). Blank lines and lines
 * starting with `#` are skipped.
 *
 * Each line becomes a raw record of four integers
 * `[fromFile, fromRawRank, toFile, toRawRank]` where files count from `a`
 * and raw ranks count down from `8`, so `e2e4` -> `[4, 6, 4, 4]`. Lines that
 * do not fit the form still produce a record (out of range, or not four
 * values long); rejecting it is up to the consumer.
 */

/**
 * Produces raw move records one at a time; `null` once exhausted.
 */
export interface MoveSource {
  nextMove(): number[] | null;
}

const FILE_BASE = 'a'.charCodeAt(0);
const RANK_TOP = '8'.charCodeAt(0);

export function recordFromLine(line: string): number[] {
  const chars = line.toLowerCase();
  const record: number[] = [];
  for (let i = 0; i < chars.length; i++) {
    const code = chars.charCodeAt(i);
    record.push(i % 2 === 0 ? code - FILE_BASE : RANK_TOP - code);
  }
  return record;
}

export function parseMoveLines(text: string): number[][] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(recordFromLine);
}

export class MoveFileSource implements MoveSource {
  private index = 0;

  constructor(private readonly records: ReadonlyArray<number[]>) {}

  static fromText(text: string): MoveFileSource {
    return new MoveFileSource(parseMoveLines(text));
  }

  nextMove(): number[] | null {
    if (this.index >= this.records.length) {
      return null;
    }
    const record = this.records[this.index];
    this.index += 1;
    return record;
  }
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read and parse a moves file. Throws MoveFileError when the file is
 * missing or cannot be read.
 */
export async function loadMoveFile(filePath: string): Promise<MoveFileSource> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = errorCodeOf(error);
    if (code === 'ENOENT') {
      throw new MoveFileError(GameErrorCode.MOVE_FILE_NOT_FOUND, filePath, undefined, { code });
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new MoveFileError(GameErrorCode.MOVE_FILE_UNREADABLE, filePath, detail, { code });
  }
  return MoveFileSource.fromText(text);
}
