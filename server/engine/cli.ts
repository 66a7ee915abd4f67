#!/usr/bin/env node
import { Identity } from '../../shared/schema';
import { loadEngineConfig } from './config-loader';
import { isPuzzleError } from './errors';
import { deriveIdentity, isIdentity } from './identity';
import { PuzzleRuntime } from './runtime';
import { EngineFileStore } from './store';

const DEFAULT_STORE = 'data/puzzle-checkpoint.json';
const DEFAULT_CONFIG = 'config/engine.json';

async function buildRuntime(args: string[]) {
  const configPath = getFlagValue(args, '--config', DEFAULT_CONFIG) ?? DEFAULT_CONFIG;
  const storePath = getFlagValue(args, '--store', DEFAULT_STORE) ?? DEFAULT_STORE;
  const config = await loadEngineConfig(configPath);
  const store = new EngineFileStore(storePath);
  const runtime = await PuzzleRuntime.loadFromStore(store, { config });
  return { runtime, store };
}

function getFlagValue(args: string[], flag: string, fallback?: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) {
    return fallback;
  }
  return args[index + 1] ?? fallback;
}

function requireFlag(args: string[], flag: string): string {
  const value = getFlagValue(args, flag);
  if (value === undefined) {
    throw new Error(`${args[0]} requires ${flag}`);
  }
  return value;
}

// Accepts a hex identity as-is; any other label is hashed into one.
function resolveIdentity(value: string): Identity {
  return isIdentity(value) ? value : deriveIdentity({ label: value });
}

function printJson(value: unknown): void {
  console.log(
    JSON.stringify(value, (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item), 2),
  );
}

async function commandMint(args: string[]) {
  const { runtime, store } = await buildRuntime(args);
  const result = runtime.mint({
    minter: resolveIdentity(requireFlag(args, '--minter')),
    name: requireFlag(args, '--name'),
    uri: requireFlag(args, '--uri'),
    puzzle_type_selector: Number(getFlagValue(args, '--type', '0')),
    difficulty: Number(getFlagValue(args, '--difficulty', '0')),
  });
  await runtime.saveToStore(store);
  printJson({ asset_id: result.asset.id, minted: result.minted, attributes: result.asset.attributes });
}

async function commandSolve(args: string[]) {
  const { runtime, store } = await buildRuntime(args);
  const result = runtime.solve({
    asset_id: requireFlag(args, '--asset'),
    solver: resolveIdentity(requireFlag(args, '--solver')),
    solution: requireFlag(args, '--solution'),
    new_uri: getFlagValue(args, '--uri'),
  });
  await runtime.saveToStore(store);
  printJson({ solved: result.solved, attributes: result.asset.attributes, uri: result.asset.uri });
}

async function commandUpdateUri(args: string[]) {
  const { runtime, store } = await buildRuntime(args);
  const result = runtime.updateUri({
    asset_id: requireFlag(args, '--asset'),
    caller: resolveIdentity(requireFlag(args, '--caller')),
    uri: requireFlag(args, '--uri'),
  });
  await runtime.saveToStore(store);
  printJson({ event: result.event, uri: result.asset.uri });
}

async function commandTransfer(args: string[]) {
  const { runtime, store } = await buildRuntime(args);
  const result = runtime.transfer({
    asset_id: requireFlag(args, '--asset'),
    from: resolveIdentity(requireFlag(args, '--from')),
    to: resolveIdentity(requireFlag(args, '--to')),
  });
  await runtime.saveToStore(store);
  printJson({ event: result.event, owner: result.asset.owner });
}

async function commandAsset(args: string[]) {
  const { runtime } = await buildRuntime(args);
  printJson(runtime.assets.requireAsset(requireFlag(args, '--asset')));
}

async function commandLedger(args: string[]) {
  const { runtime } = await buildRuntime(args);
  printJson(runtime.ledger.getEvents());
}

async function commandVerify(args: string[]) {
  const { runtime } = await buildRuntime(args);
  const report = runtime.ledger.verifyIntegrity();
  printJson(report);
  if (!report.ok) {
    process.exitCode = 1;
  }
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  switch (command) {
    case 'mint':
      await commandMint(args);
      return;
    case 'solve':
      await commandSolve(args);
      return;
    case 'update-uri':
      await commandUpdateUri(args);
      return;
    case 'transfer':
      await commandTransfer(args);
      return;
    case 'asset':
      await commandAsset(args);
      return;
    case 'ledger':
      await commandLedger(args);
      return;
    case 'verify':
      await commandVerify(args);
      return;
    default:
      throw new Error(`unknown command: ${command ?? '(none)'}`);
  }
}

main().catch((error: unknown) => {
  if (isPuzzleError(error)) {
    console.error(JSON.stringify({ code: error.code, message: error.message, details: error.details }));
  } else {
    console.error(error);
  }
  process.exit(1);
});
