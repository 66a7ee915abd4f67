import { readFile } from 'fs/promises';
import { EngineConfig, parseEngineConfig } from './config';
import { ValidationError } from './errors';

export async function loadEngineConfig(filePath: string): Promise<EngineConfig> {
  const raw = await readFile(filePath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`config is not valid JSON: ${filePath}`, { error });
  }

  return parseEngineConfig(parsed, filePath);
}
