import { spawn, type ChildProcess } from 'child_process';
import os from 'os';
import path from 'path';
import type { SpeechRequest, Synthesizer } from '../types/speech';

export type SpeechEngine = 'piper' | 'espeak-ng';

const AVAILABILITY_TIMEOUT_MS = 2000;
const SPEAK_TIMEOUT_MS = 10000;

const PIPER_VOICE_DIR = path.join(os.homedir(), '.local', 'share', 'piper-voices');

const PIPER_MODELS: Record<string, string> = {
  sv: 'sv_SE-nst-medium.onnx',
  en: 'en_US-lessac-medium.onnx',
};

/** Sound ids are written so a TTS voice can read them aloud as-is */
export function spokenText(request: SpeechRequest): string {
  return request.kind === 'text' ? request.text : request.soundId;
}

export async function commandAvailable(command: string): Promise<boolean> {
  return new Promise((resolve) => {
    const proc = spawn(command, ['--help'], { stdio: 'ignore' });

    const timer = setTimeout(() => {
      proc.kill();
      resolve(false);
    }, AVAILABILITY_TIMEOUT_MS);

    proc.on('close', (code) => {
      clearTimeout(timer);
      resolve(code === 0);
    });

    proc.on('error', () => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}

/** Piper first, espeak-ng as fallback, null when neither is installed. */
export async function detectSpeechEngine(): Promise<SpeechEngine | null> {
  if (await commandAvailable('piper')) {
    return 'piper';
  }
  if (await commandAvailable('espeak-ng')) {
    return 'espeak-ng';
  }
  return null;
}

/** Piper model for a curriculum language such as "sv" or "en-GB"; Swedish when unknown */
export function piperModelFor(language: string): string {
  const base = language.toLowerCase().split(/[-_]/)[0];
  return path.join(PIPER_VOICE_DIR, PIPER_MODELS[base] ?? PIPER_MODELS.sv);
}

export interface CommandSynthesizerOptions {
  engine: SpeechEngine;
  /** espeak-ng voice */
  voice?: string;
  /** Piper .onnx voice model */
  piperModel?: string;
  /** Piper speaking rate; above 1 is slower */
  lengthScale?: number;
  /** Kill an utterance that plays longer than this */
  timeoutMs?: number;
}

/**
 * Speaks through an installed TTS command. Slow, clear speech by default:
 * children with verbal dyspraxia need time to hear each phoneme.
 */
export class CommandSynthesizer implements Synthesizer {
  private readonly running = new Set<ChildProcess>();
  private readonly options: Required<CommandSynthesizerOptions>;

  constructor(options: CommandSynthesizerOptions) {
    this.options = {
      voice: 'sv',
      piperModel: piperModelFor('sv'),
      lengthScale: 1.5,
      timeoutMs: SPEAK_TIMEOUT_MS,
      ...options,
    };
  }

  speak(request: SpeechRequest): Promise<void> {
    const text = spokenText(request);
    if (this.options.engine === 'piper') {
      return this.speakWithPiper(text);
    }
    return this.run(spawn('espeak-ng', ['-v', this.options.voice, text], { stdio: 'ignore' }), 'espeak-ng');
  }

  stop(): void {
    for (const proc of this.running) {
      proc.kill();
    }
  }

  private speakWithPiper(text: string): Promise<void> {
    const piper = spawn(
      'piper',
      ['--model', this.options.piperModel, '--output-raw', '--length-scale', String(this.options.lengthScale)],
      { stdio: ['pipe', 'pipe', 'ignore'] }
    );
    const player = spawn('aplay', ['-r', '22050', '-f', 'S16_LE', '-c', '1', '-q'], {
      stdio: ['pipe', 'ignore', 'ignore'],
    });

    if (piper.stdout && player.stdin) {
      piper.stdout.pipe(player.stdin);
      // aplay going away mid-stream surfaces through its exit code
      player.stdin.on('error', (err) => console.warn('[speech]', `aplay input closed: ${err.message}`));
    }
    piper.stdin?.end(text);

    return Promise.all([this.run(piper, 'piper'), this.run(player, 'aplay')]).then(() => undefined);
  }

  private run(proc: ChildProcess, label: string): Promise<void> {
    this.running.add(proc);

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        proc.kill();
      }, this.options.timeoutMs);

      proc.on('error', (err) => {
        clearTimeout(timer);
        this.running.delete(proc);
        reject(err);
      });

      proc.on('close', (code, signal) => {
        clearTimeout(timer);
        this.running.delete(proc);
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${label} exited with ${signal ?? `code ${code}`}`));
        }
      });
    });
  }
}

/** For machines without any TTS: every utterance finishes at once. */
export class SilentSynthesizer implements Synthesizer {
  async speak(_request: SpeechRequest): Promise<void> {
    return;
  }

  stop(): void {
    // nothing is ever playing
  }
}
