import fs from 'fs';
import os from 'os';
import path from 'path';
import { createSessionController, createStorage, createSynthesizer } from './bootstrap';
import { DEFAULT_CONFIG, loadConfig } from './config';
import { closeDb } from './db';
import { ProgressLedger } from './progressLedger';
import { JsonFileProgressStorage, SqliteProgressStorage } from './progressStorage';
import { CommandSynthesizer, SilentSynthesizer } from './synthesizers';
import { FakeSynthesizer } from '../testing/fixtures';

describe('bootstrap', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'phonics-data-'));
  });

  afterEach(() => {
    closeDb();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('picks the storage backend from the config', () => {
    expect(createStorage({ ...DEFAULT_CONFIG, dataDir, storage: 'json' })).toBeInstanceOf(JsonFileProgressStorage);
    expect(createStorage({ ...DEFAULT_CONFIG, dataDir, storage: 'sqlite' })).toBeInstanceOf(SqliteProgressStorage);
    expect(fs.existsSync(path.join(dataDir, 'progress.db'))).toBe(true);
  });

  it('keeps SQLite profiles in the configured data directory', () => {
    const otherDir = path.join(dataDir, 'other');
    const first = createStorage({ ...DEFAULT_CONFIG, dataDir, storage: 'sqlite' });
    const second = createStorage({ ...DEFAULT_CONFIG, dataDir: otherDir, storage: 'sqlite' });

    expect(ProgressLedger.fresh(second, 'olle').persist()).toEqual({ ok: true });

    expect(fs.existsSync(path.join(otherDir, 'progress.db'))).toBe(true);
    expect(second.listProfiles()).toEqual(['olle']);
    expect(first.listProfiles()).toEqual([]);
  });

  describe('createSynthesizer', () => {
    const originalPath = process.env.PATH;

    beforeEach(() => {
      process.env.PATH = dataDir;
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
      if (originalPath === undefined) {
        delete process.env.PATH;
      } else {
        process.env.PATH = originalPath;
      }
      jest.restoreAllMocks();
    });

    it("speaks with a voice for the curriculum's language", async () => {
      const argsFile = path.join(dataDir, 'espeak.args');
      fs.writeFileSync(
        path.join(dataDir, 'espeak-ng'),
        `#!/bin/sh\n[ "$1" = "--help" ] && exit 0\n/usr/bin/printf '%s\\n' "$@" > ${argsFile}\n`,
        { mode: 0o755 }
      );

      const synth = await createSynthesizer('en');
      await synth.speak({ kind: 'text', text: 'Yes!' });

      expect(synth).toBeInstanceOf(CommandSynthesizer);
      expect(fs.readFileSync(argsFile, 'utf-8')).toBe('-v\nen\nYes!\n');
    });

    it('runs silently without a TTS engine', async () => {
      await expect(createSynthesizer('sv')).resolves.toBeInstanceOf(SilentSynthesizer);
      expect(console.warn).toHaveBeenCalledWith(
        '[speech]',
        'No TTS engine found (piper or espeak-ng); running without voice'
      );
    });
  });

  it('wires a working controller from the environment', async () => {
    const config = loadConfig({
      PHONICS_DATA_DIR: dataDir,
      PHONICS_STORAGE: 'json',
      PHONICS_CURRICULUM_PATH: path.join(process.cwd(), 'data', 'curriculum.json'),
    });
    const synth = new FakeSynthesizer('auto');

    const controller = await createSessionController(config, { synthesizer: synth });
    const session = controller.startSession('maja', 'explore');
    const item = session.engine.nextItem();
    const summary = await session.end();

    expect(item.kind === 'letter' && item.letter.id).toBe('A');
    expect(synth.spoken).toEqual([{ kind: 'text', text: 'A. ah. aaa.' }]);
    expect(summary.persisted).toBe(true);
    expect(fs.existsSync(path.join(dataDir, 'profiles', 'maja.json'))).toBe(true);
  });
});
