import { describe, it, expect, afterEach } from 'vitest';
import path from 'node:path';
import { loadConfig, getDefaultConfig, findConfig, loadConfigOrDefault, parseConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/errors/index.js';
import { createTempProject, getFixturePath, VALID_CONFIG, type TempProjectResult } from '../../helpers/fixtures.js';

describe('Config Loader', () => {
  describe('loadConfig', () => {
    it('should load and parse a valid config file', async () => {
      const config = await loadConfig(getFixturePath('configs', 'valid-config.json'));

      expect(config.include).toEqual(['src/**/*.py']);
      expect(config.exclude).toEqual(['**/venv/**']);
      expect(config.overwriteExisting).toBe(true);
      expect(config.sections).toEqual(['Args', 'Returns', 'Raises', 'Examples']);
      expect(config.concurrency).toBe(2);
      expect(config.placeholders).toEqual({
        summary: 'Summary of {name}.',
        description: 'Describe me.',
        examples: '>>> ...',
      });
    });

    it('should apply defaults for missing optional fields', async () => {
      const config = await loadConfig(getFixturePath('configs', 'minimal-config.json'));

      expect(config).toEqual(getDefaultConfig());
    });

    it('should throw for non-existent config file', async () => {
      await expect(loadConfig('/non/existent/config.json')).rejects.toThrow('Config file not found');
    });

    it('should throw for invalid JSON', async () => {
      await expect(loadConfig(getFixturePath('configs', 'invalid-json.json'))).rejects.toThrow('Invalid JSON');
    });

    it('should list the failing fields for schema errors', async () => {
      const configPath = getFixturePath('configs', 'invalid-schema.json');

      await expect(loadConfig(configPath)).rejects.toThrow(ConfigError);
      await expect(loadConfig(configPath)).rejects.toThrow(/Invalid configuration[\s\S]*- sections\.1:[\s\S]*- concurrency:/);
    });
  });

  describe('parseConfig', () => {
    it('should name the source of the configuration', () => {
      expect(() => parseConfig({ dryRun: 'yes' }, 'flags')).toThrow('Invalid configuration in flags:\n  - dryRun:');
    });
  });

  describe('findConfig', () => {
    let project: TempProjectResult;

    afterEach(() => {
      project.cleanup();
    });

    it('should find a config file in a parent directory', async () => {
      project = createTempProject({
        'docsmith.config.json': JSON.stringify(VALID_CONFIG),
        'src/pkg/mod.py': 'x = 1\n',
      });

      const config = await findConfig(project.getFilePath('src/pkg'));

      expect(config?.concurrency).toBe(2);
      expect(config?.placeholders.description).toBe('Describe me.');
    });

    it('should read the docsmith key of package.json', async () => {
      project = createTempProject({
        'package.json': JSON.stringify({ name: 'demo', docsmith: { dryRun: true } }),
      });

      const config = await findConfig(project.rootDir);

      expect(config?.dryRun).toBe(true);
    });

    it('should prefer a config file over package.json in the same directory', async () => {
      project = createTempProject({
        '.docsmithrc': JSON.stringify({ concurrency: 8 }),
        'package.json': JSON.stringify({ docsmith: { concurrency: 2 } }),
      });

      expect((await findConfig(project.rootDir))?.concurrency).toBe(8);
    });

    it('should reject an invalid docsmith key', async () => {
      project = createTempProject({
        'package.json': JSON.stringify({ docsmith: { concurrency: 'many' } }),
      });

      await expect(findConfig(project.rootDir)).rejects.toThrow(ConfigError);
    });

    it('should fall back to the defaults', async () => {
      project = createTempProject({ 'package.json': JSON.stringify({ name: 'demo' }) });

      expect(await loadConfigOrDefault(path.join(project.rootDir))).toEqual(getDefaultConfig());
    });
  });
});
