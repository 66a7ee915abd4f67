import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseEngineConfig } from './config';
import { loadEngineConfig } from './config-loader';
import { ValidationError } from './errors';
import { captureError, captureRejection } from './testing';

describe('parseEngineConfig', () => {
  it('fills in defaults', () => {
    expect(parseEngineConfig({})).toEqual({
      program_id: 'puzzle-collectibles',
      authority_seed: 'authority',
      symbol: 'PUZZLE',
      hidden_trait: { enabled: false, placeholder: '???' },
      limits: { max_difficulty: 255, max_name_length: 32, max_uri_length: 200 },
      entropy: { genesis_ms: 0, slot_duration_ms: 400 },
    });
  });

  it('lists every issue with its path', () => {
    const error = captureError(() =>
      parseEngineConfig({ program_id: '', limits: { max_difficulty: 300 } }, 'test config'),
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'invalid test config',
      details: [
        'program_id: String must contain at least 1 character(s)',
        'limits.max_difficulty: Number must be less than or equal to 255',
      ],
    });
  });
});

describe('loadEngineConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'puzzle-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a file', async () => {
    const filePath = join(dir, 'engine.json');
    await writeFile(filePath, JSON.stringify({ program_id: 'file-program', hidden_trait: { enabled: true } }));

    const config = await loadEngineConfig(filePath);

    expect(config.program_id).toBe('file-program');
    expect(config.hidden_trait).toEqual({ enabled: true, placeholder: '???' });
  });

  it('reports invalid JSON', async () => {
    const filePath = join(dir, 'broken.json');
    await writeFile(filePath, '{ "program_id": ');

    expect(await captureRejection(loadEngineConfig(filePath))).toMatchObject({
      message: `config is not valid JSON: ${filePath}`,
    });
  });

  it('loads the shipped configuration', async () => {
    const config = await loadEngineConfig(join(__dirname, '..', '..', 'config', 'engine.json'));

    expect(config.program_id).toBe('puzzle-collectibles-devnet');
    expect(config.collection_id).toBe('puzzle-collection-genesis');
  });
});
