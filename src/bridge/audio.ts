/**
 * Voice-note conversion. WhatsApp plays voice notes only as Opus in an OGG
 * container, so any other audio file goes through ffmpeg first.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { existsSync } from 'fs';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, extname, join } from 'path';

import { logger } from '../middleware/logger.js';
import { errorMessage } from '../utils/errors.js';

const execFileAsync = promisify(execFile);

const FFMPEG_BIN = process.env.FFMPEG_BIN ?? 'ffmpeg';
const FFMPEG_TIMEOUT_MS = 60_000;

export function ffmpegArgs(inputPath: string, outputPath: string): string[] {
  return [
    '-y',
    '-i', inputPath,
    '-c:a', 'libopus',
    '-b:a', '32k',
    '-ar', '24000',
    '-application', 'voip',
    outputPath,
  ];
}

/**
 * Convert `inputPath` to Opus/OGG in a fresh temp directory and return the
 * new file's path. Throws with ffmpeg's stderr when the conversion fails.
 */
export async function convertToOpusOggTemp(inputPath: string): Promise<string> {
  if (!existsSync(inputPath)) {
    throw new Error(`Input file not found: ${inputPath}`);
  }

  const dir = await mkdtemp(join(tmpdir(), 'wa-voice-'));
  const outputPath = join(dir, `${basename(inputPath, extname(inputPath))}.ogg`);

  try {
    await execFileAsync(FFMPEG_BIN, ffmpegArgs(inputPath, outputPath), { timeout: FFMPEG_TIMEOUT_MS });
  } catch (err) {
    const stderr = hasStderr(err) ? err.stderr.trim() : '';
    await rm(dir, { recursive: true, force: true });
    throw new Error(`Failed to convert audio: ${stderr || errorMessage(err)}`, { cause: err });
  }

  logger.debug({ inputPath, outputPath }, 'Converted audio to Opus/OGG');
  return outputPath;
}

function hasStderr(err: unknown): err is { stderr: string } {
  return typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string';
}
