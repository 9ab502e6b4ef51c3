/**
 * End-to-end tests for one top-level run
 */

import * as fs from 'fs';
import * as path from 'path';
import { unzipSync } from 'fflate';
import { parseRunMode, runPipeline } from '../batch/pipeline';
import { buildSettings, Settings } from '../config/settings';
import { FakeTranslator } from '../__mocks__/fakeTranslator';
import { makeTempDir, readJson, removeDir, writeJson } from './helpers';

describe('runPipeline', () => {
  let workDir: string;
  let settings: Settings;

  beforeEach(() => {
    workDir = makeTempDir();
    settings = buildSettings({ api_url: 'http://127.0.0.1:5000/v1/chat/completions', log_file: null }, workDir, {});
    writeJson(path.join(settings.paths.rawFolder, 'a.json'), {
      title: 'タイトル',
      text_block_list: [{ name: 'モノローグ', text: 'こんにちは', choice_data_list: [] }],
    });
    writeJson(settings.paths.charSystemTextRaw, { '1001': { '1': 'おはよう' } });
  });

  afterEach(() => {
    removeDir(workDir);
  });

  it('should run both batches and pack everything written into one archive', async () => {
    const translator = new FakeTranslator({ 'タイトル': 'Title', 'こんにちは': 'Hello', 'おはよう': 'Morning' });

    const { stats, archivePath } = await runPipeline(settings, translator, { mode: 'both', createZip: true });

    expect(stats.translatedCount).toBe(3);
    expect(stats.skippedCount).toBe(1);
    expect(stats.failedCount).toBe(0);
    expect(archivePath).toBe(path.join(settings.paths.updatesFolder, 'update_1.zip'));

    const entries = unzipSync(new Uint8Array(fs.readFileSync(archivePath ?? '')));
    expect(Object.keys(entries)).toEqual(['a.json', 'character_system_text.json']);
    expect(JSON.parse(Buffer.from(entries['a.json']).toString('utf-8'))).toEqual({
      title: 'Title',
      text_block_list: [{ name: '', text: 'Hello', choice_data_list: [] }],
    });
  });

  it('should not create an archive when the second run writes nothing new', async () => {
    await runPipeline(settings, new FakeTranslator(), { mode: 'folder', createZip: true });

    const translator = new FakeTranslator();
    const { stats, archivePath } = await runPipeline(settings, translator, { mode: 'folder', createZip: true });

    expect(translator.calls).toEqual([]);
    expect(stats.skippedCount).toBe(1);
    expect(archivePath).toBeNull();
    expect(fs.readdirSync(settings.paths.updatesFolder)).toEqual(['update_1.zip']);
  });

  it('should record an archive failure and still return the run counts', async () => {
    fs.mkdirSync(workDir, { recursive: true });
    fs.writeFileSync(settings.paths.updatesFolder, 'not a folder', 'utf-8');
    const translator = new FakeTranslator();

    const { stats, archivePath } = await runPipeline(settings, translator, { mode: 'folder', createZip: true });

    expect(archivePath).toBeNull();
    expect(stats.translatedCount).toBe(2);
    expect(stats.failures.map(failure => failure.path)).toEqual([settings.paths.updatesFolder]);
    expect(fs.existsSync(path.join(settings.paths.translatedFolder, 'a.json'))).toBe(true);
  });

  it('should only run the character batch in character mode', async () => {
    const translator = new FakeTranslator();

    const { archivePath } = await runPipeline(settings, translator, { mode: 'character', createZip: false });

    expect(translator.calls).toEqual(['おはよう']);
    expect(archivePath).toBeNull();
    expect(readJson(settings.paths.charSystemTextOutput)).toEqual({ '1001': { '1': 'en:おはよう' } });
    expect(fs.existsSync(settings.paths.updatesFolder)).toBe(false);
  });
});

describe('parseRunMode', () => {
  it('should accept the short and long answers', () => {
    expect(parseRunMode('f')).toBe('folder');
    expect(parseRunMode(' Folder ')).toBe('folder');
    expect(parseRunMode('c')).toBe('character');
    expect(parseRunMode('character system text')).toBe('character');
    expect(parseRunMode('')).toBe('both');
    expect(parseRunMode('x')).toBeNull();
  });
});
