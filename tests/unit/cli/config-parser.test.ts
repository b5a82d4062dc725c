import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseConfigFile } from '../../../src/cli/config/parser.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir, writeTempFile } from '../../helpers/temp-dir.js';

describe('parseConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should read the import section from YAML', async () => {
    const file = await writeTempFile(
      dir,
      'eventsmith.yml',
      [
        'import:',
        '  transform: pageviews',
        '  fileType: tsv',
        '  headers: [user_id, time, url]',
        '  table: pageviews',
        '  validation:',
        '    idField: user_id',
        '  output:',
        '    format: json',
        '    path: out.json',
        '  target:',
        '    uri: mongodb://localhost:27017',
        '    database: analytics',
        '    batchSize: 500',
        '',
      ].join('\n'),
    );

    const config = parseConfigFile(file);

    expect(config.import?.transform).toBe('pageviews');
    expect(config.import?.fileType).toBe('tsv');
    expect(config.import?.headers).toEqual(['user_id', 'time', 'url']);
    expect(config.import?.table).toBe('pageviews');
    expect(config.import?.validation).toEqual({ idField: 'user_id' });
    expect(config.import?.output).toEqual({ format: 'json', path: 'out.json' });
    expect(config.import?.target).toEqual({
      uri: 'mongodb://localhost:27017',
      database: 'analytics',
      batchSize: 500,
    });
  });

  it('should read JSON config files', async () => {
    const file = await writeTempFile(
      dir,
      'eventsmith.json',
      JSON.stringify({ import: { transform: './t.yml', expressionTimeoutMs: 250 } }),
    );

    const config = parseConfigFile(file);

    expect(config.import?.transform).toBe('./t.yml');
    expect(config.import?.expressionTimeoutMs).toBe(250);
  });

  it('should return an empty config without an import section', async () => {
    const file = await writeTempFile(dir, 'empty.yml', '');

    expect(parseConfigFile(file)).toEqual({});
  });

  it('should reject unsupported extensions', () => {
    expect(() => parseConfigFile('config.toml')).toThrow(
      'Unsupported config file format: config.toml. Must be .json, .yaml, or .yml',
    );
  });

  it('should reject values of the wrong type', async () => {
    const file = await writeTempFile(dir, 'bad.yml', 'import:\n  table: 42\n');

    expect(() => parseConfigFile(file)).toThrow(ConfigError);
    expect(() => parseConfigFile(file)).toThrow(`'import.table' must be a string in ${file}`);
  });

  it('should reject timeouts that are not positive integers', async () => {
    const file = await writeTempFile(dir, 'bad.yml', 'import:\n  expressionTimeoutMs: 0\n');

    expect(() => parseConfigFile(file)).toThrow(
      `'import.expressionTimeoutMs' must be a positive integer in ${file}`,
    );
  });

  it('should reject batch sizes that are not positive integers', async () => {
    const file = await writeTempFile(dir, 'bad.yml', 'import:\n  target:\n    batchSize: -1\n');

    expect(() => parseConfigFile(file)).toThrow(
      `'import.target.batchSize' must be a positive integer in ${file}`,
    );
  });

  it('should reject unknown file types', async () => {
    const file = await writeTempFile(dir, 'bad.yml', 'import:\n  fileType: xml\n');

    expect(() => parseConfigFile(file)).toThrow(
      `'import.fileType' must be csv, tsv or json in ${file}`,
    );
  });

  it('should reject malformed files', async () => {
    const file = await writeTempFile(dir, 'broken.json', '{"import": ');

    expect(() => parseConfigFile(file)).toThrow(`Failed to parse config file: ${file}`);
  });
});
