/**
 * Tests for StoryTranslator
 *
 * Covers the field order, the narration rule and the resume / no-partial-write
 * behaviour on real files in a scratch directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { StoryTranslator, isMonologueName } from '../core/storyTranslator';
import { MalformedInputError, TranslationExhaustedError } from '../core/errors';
import { StoryDocument } from '../core/types';
import { FakeTranslator } from '../__mocks__/fakeTranslator';
import { makeTempDir, readJson, removeDir, writeJson } from './helpers';

describe('StoryTranslator', () => {
  let workDir: string;
  let rawDir: string;
  let outDir: string;

  beforeEach(() => {
    workDir = makeTempDir();
    rawDir = path.join(workDir, 'raw');
    outDir = path.join(workDir, 'translated');
  });

  afterEach(() => {
    removeDir(workDir);
  });

  describe('translateDocument', () => {
    it('should translate title, names, bodies and choices in document order', async () => {
      const translator = new FakeTranslator();
      const story = new StoryTranslator(translator, rawDir, outDir);
      const document: StoryDocument = {
        title: '始まり',
        text_block_list: [
          { name: 'スペ', text: 'よろしく', choice_data_list: ['はい', 'いいえ'] },
          { name: 'モノローグ', text: '風が吹く', choice_data_list: [] },
        ],
      };

      const counts = await story.translateDocument(document);

      expect(translator.calls).toEqual(['始まり', 'スペ', 'よろしく', 'はい', 'いいえ', '風が吹く']);
      expect(document).toEqual({
        title: 'en:始まり',
        text_block_list: [
          { name: 'en:スペ', text: 'en:よろしく', choice_data_list: ['en:はい', 'en:いいえ'] },
          { name: '', text: 'en:風が吹く', choice_data_list: [] },
        ],
      });
      expect(counts).toEqual({ translatedFields: 6, skippedFields: 1 });
    });

    it('should never send an empty or narration name to the backend', async () => {
      const translator = new FakeTranslator();
      const story = new StoryTranslator(translator, rawDir, outDir);
      const document: StoryDocument = {
        text_block_list: [
          { name: '', text: 'あ', choice_data_list: [] },
          { name: 'モノローグ', text: 'い', choice_data_list: [] },
        ],
      };

      await story.translateDocument(document);

      expect(translator.calls).toEqual(['あ', 'い']);
      expect(document.text_block_list.map(unit => unit.name)).toEqual(['', '']);
    });

    it('should leave a missing or empty title alone', async () => {
      const translator = new FakeTranslator();
      const story = new StoryTranslator(translator, rawDir, outDir);
      const document: StoryDocument = { title: '', text_block_list: [] };

      const counts = await story.translateDocument(document);

      expect(translator.calls).toEqual([]);
      expect(document.title).toBe('');
      expect(counts).toEqual({ translatedFields: 0, skippedFields: 0 });
    });
  });

  describe('translateFile', () => {
    it('should write the translated document to the mirrored output path', async () => {
      const inputPath = path.join(rawDir, 'story', '04', 'a.json');
      writeJson(inputPath, {
        title: 'タイトル',
        text_block_list: [{ name: 'モノローグ', text: 'こんにちは', choice_data_list: [] }],
      });
      const translator = new FakeTranslator({ 'タイトル': 'Title', 'こんにちは': 'Hello' });
      const story = new StoryTranslator(translator, rawDir, outDir);

      const outcome = await story.translateFile(inputPath);

      const outputPath = path.join(outDir, 'story', '04', 'a.json');
      expect(outcome).toEqual({
        status: 'translated',
        inputPath,
        outputPath,
        translatedFields: 2,
        skippedFields: 1,
      });
      expect(readJson(outputPath)).toEqual({
        title: 'Title',
        text_block_list: [{ name: '', text: 'Hello', choice_data_list: [] }],
      });
    });

    it('should keep fields it does not translate', async () => {
      const inputPath = path.join(rawDir, 'b.json');
      writeJson(inputPath, {
        story_id: '040001',
        text_block_list: [{ name: 'スペ', text: 'よし', choice_data_list: null, voice: 'v_001' }],
      });
      const story = new StoryTranslator(new FakeTranslator(), rawDir, outDir);

      await story.translateFile(inputPath);

      expect(readJson(path.join(outDir, 'b.json'))).toEqual({
        story_id: '040001',
        text_block_list: [{ name: 'en:スペ', text: 'en:よし', choice_data_list: [], voice: 'v_001' }],
      });
    });

    it('should skip a document whose output already exists without calling the backend', async () => {
      const inputPath = path.join(rawDir, 'a.json');
      writeJson(inputPath, { title: 'タイトル', text_block_list: [] });
      writeJson(path.join(outDir, 'a.json'), { title: 'Old', text_block_list: [] });
      const translator = new FakeTranslator();
      const story = new StoryTranslator(translator, rawDir, outDir);

      const outcome = await story.translateFile(inputPath);

      expect(outcome.status).toBe('skipped');
      expect(translator.calls).toEqual([]);
      expect(readJson(path.join(outDir, 'a.json'))).toEqual({ title: 'Old', text_block_list: [] });
    });

    it('should not write anything when a field fails', async () => {
      const inputPath = path.join(rawDir, 'a.json');
      writeJson(inputPath, {
        title: 'タイトル',
        text_block_list: [{ name: '', text: '壊れる', choice_data_list: [] }],
      });
      const translator = new FakeTranslator().failOn('壊れる', new TranslationExhaustedError('壊れる', 4));
      const story = new StoryTranslator(translator, rawDir, outDir);

      await expect(story.translateFile(inputPath)).rejects.toBeInstanceOf(TranslationExhaustedError);
      expect(fs.existsSync(path.join(outDir, 'a.json'))).toBe(false);
    });

    it('should reject a document without text_block_list', async () => {
      const inputPath = path.join(rawDir, 'a.json');
      writeJson(inputPath, { title: 'タイトル' });
      const translator = new FakeTranslator();
      const story = new StoryTranslator(translator, rawDir, outDir);

      await expect(story.translateFile(inputPath)).rejects.toBeInstanceOf(MalformedInputError);
      expect(translator.calls).toEqual([]);
    });
  });

  describe('isMonologueName', () => {
    it('should match only the empty name and the narration marker', () => {
      expect(isMonologueName('')).toBe(true);
      expect(isMonologueName('モノローグ')).toBe(true);
      expect(isMonologueName('トレーナー')).toBe(false);
    });
  });
});
