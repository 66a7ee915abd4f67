import { beforeEach, describe, expect, it } from 'vitest';
import { AssetLedger } from './assets';
import { EngineConfigInput } from './config';
import { ExecutionError, PuzzleErrorCode, ValidationError } from './errors';
import { PuzzleKernel, parseSolution } from './kernel';
import { Ledger } from './ledger';
import { ManualEntropySource, captureError, createManualEntropySource, identityFor } from './testing';

const minter = identityFor('minter');
const buyer = identityFor('buyer');
const stranger = identityFor('stranger');

const config: EngineConfigInput = {
  program_id: 'test-program',
  authority_seed: 'test-authority',
  hidden_trait: { enabled: true },
};

describe('PuzzleKernel', () => {
  let ledger: Ledger;
  let assets: AssetLedger;
  let entropy: ManualEntropySource;
  let kernel: PuzzleKernel;

  beforeEach(() => {
    ledger = new Ledger();
    assets = new AssetLedger();
    entropy = createManualEntropySource({ slot: 42, timestamp: 1_700_000_000 });
    kernel = new PuzzleKernel(ledger, assets, { config, entropy });
  });

  function mintFactorPuzzle() {
    return kernel.mint({
      minter,
      name: 'Puzzle #1',
      uri: 'https://example.test/1.json',
      puzzle_type_selector: 0,
      difficulty: 1,
    });
  }

  describe('mint', () => {
    it('creates an unsolved asset owned by the minter', () => {
      const outcome = mintFactorPuzzle();

      expect(outcome.minted).toEqual({
        asset_id: outcome.asset.id,
        puzzle_type: 'math_factor',
        puzzle_number: '186',
        minter,
      });
      expect(outcome.asset).toMatchObject({
        name: 'Puzzle #1',
        symbol: 'PUZZLE',
        uri: 'https://example.test/1.json',
        owner: minter,
        update_authority: kernel.authority.identity,
        revision: 0,
        created_at: '2023-11-14T22:13:20.000Z',
      });
      expect(outcome.asset.attributes).toEqual([
        { key: 'puzzle_type', value: 'math_factor' },
        { key: 'difficulty', value: '1' },
        { key: 'puzzle_number', value: '186' },
        { key: 'solution_hash', value: '54cef7' },
        { key: 'solved', value: 'false' },
        { key: 'mint_slot', value: '42' },
        { key: 'hidden_trait', value: '???' },
      ]);
      expect(assets.getHolding(outcome.asset.id)).toEqual({ asset_id: outcome.asset.id, owner: minter, amount: 1 });
      expect(outcome.event).toMatchObject({ type: 'PUZZLE_MINTED', actor_id: minter, slot: 42 });
    });

    it('gives each mint its own asset id', () => {
      const first = mintFactorPuzzle();
      const second = mintFactorPuzzle();

      expect(first.asset.id).not.toBe(second.asset.id);
      expect(assets.listAssetsByOwner(minter)).toHaveLength(2);
    });

    it('derives the update authority from the configured program', () => {
      const other = new PuzzleKernel(new Ledger(), new AssetLedger(), {
        config: { ...config, authority_seed: 'other-seed' },
        entropy,
      });
      expect(other.authority.identity).not.toBe(kernel.authority.identity);
    });

    it('rejects an unknown puzzle type without touching state', () => {
      const error = captureError(() =>
        kernel.mint({ minter, name: 'Broken', uri: '', puzzle_type_selector: 7, difficulty: 1 }),
      );

      expect(error).toMatchObject({ code: PuzzleErrorCode.INVALID_PUZZLE_TYPE });
      expect(assets.listAssets()).toEqual([]);
      expect(ledger.getEvents()).toEqual([]);
    });

    it('validates name, uri and metadata', () => {
      const base = { minter, name: 'Puzzle', uri: '', puzzle_type_selector: 0, difficulty: 0 };

      expect(captureError(() => kernel.mint({ ...base, name: '   ' }))).toBeInstanceOf(ValidationError);
      expect(captureError(() => kernel.mint({ ...base, name: 'n'.repeat(33) }))).toBeInstanceOf(ValidationError);
      expect(captureError(() => kernel.mint({ ...base, uri: 'u'.repeat(201) }))).toBeInstanceOf(ValidationError);
      expect(
        captureError(() => kernel.mint({ ...base, metadata: [{ key: 'solved', value: 'true' }] })),
      ).toMatchObject({ message: 'metadata key is reserved for the puzzle: solved' });
      expect(ledger.getEvents()).toEqual([]);
    });

    it('rejects an out-of-range entropy timestamp without touching state', () => {
      entropy.set({ slot: 43, timestamp: 9_000_000_000_000 });

      const error = captureError(() => mintFactorPuzzle());

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'entropy timestamp must be at most 8640000000000' });
      expect(ledger.getEvents()).toEqual([]);
    });

    it('keeps caller metadata ahead of the hidden trait', () => {
      const outcome = kernel.mint({
        minter,
        name: 'Puzzle',
        uri: '',
        puzzle_type_selector: 2,
        difficulty: 0,
        metadata: [{ key: 'series', value: 'one' }],
      });

      expect(outcome.asset.attributes.slice(6)).toEqual([
        { key: 'series', value: 'one' },
        { key: 'hidden_trait', value: '???' },
      ]);
      expect(outcome.minted.puzzle_number).toBe('343');
    });
  });

  describe('solve', () => {
    it('marks the puzzle solved and reveals the hidden trait', () => {
      const { asset } = mintFactorPuzzle();
      entropy.set({ slot: 50, timestamp: 1_700_000_005 });

      const outcome = kernel.solve({ asset_id: asset.id, solver: minter, solution: 31n });

      expect(outcome.asset.attributes).toEqual([
        { key: 'puzzle_type', value: 'math_factor' },
        { key: 'difficulty', value: '1' },
        { key: 'puzzle_number', value: '186' },
        { key: 'solution_hash', value: '54cef7' },
        { key: 'solved', value: 'true' },
        { key: 'mint_slot', value: '42' },
        { key: 'hidden_trait', value: 'Legendary Solver' },
        { key: 'solver', value: minter },
        { key: 'solution', value: '31' },
        { key: 'solve_timestamp', value: '1700000005' },
        { key: 'rarity', value: 'Legendary' },
      ]);
      expect(outcome.asset.revision).toBe(1);
      expect(outcome.asset.updated_at).toBe('2023-11-14T22:13:25.000Z');
      expect(outcome.solved).toEqual({
        asset_id: asset.id,
        solver: minter,
        solve_timestamp: 1_700_000_005,
        rarity: 'Legendary',
      });
      expect(ledger.getEvents().map((event) => event.type)).toEqual(['PUZZLE_MINTED', 'PUZZLE_SOLVED']);
    });

    it('leaves everything unchanged on a wrong answer', () => {
      const { asset } = mintFactorPuzzle();

      const error = captureError(() => kernel.solve({ asset_id: asset.id, solver: minter, solution: 5n }));

      expect(error).toMatchObject({ code: PuzzleErrorCode.INCORRECT_SOLUTION });
      expect(assets.requireAsset(asset.id)).toEqual(asset);
      expect(ledger.getEvents()).toHaveLength(1);
    });

    it('allows only one successful solve', () => {
      const { asset } = mintFactorPuzzle();
      kernel.solve({ asset_id: asset.id, solver: minter, solution: 31n });

      const error = captureError(() => kernel.solve({ asset_id: asset.id, solver: minter, solution: 2n }));

      expect(error).toMatchObject({ code: PuzzleErrorCode.ALREADY_SOLVED });
      expect(assets.requireAsset(asset.id).revision).toBe(1);
    });

    it('rejects a solver who does not own the asset', () => {
      const { asset } = mintFactorPuzzle();

      expect(captureError(() => kernel.solve({ asset_id: asset.id, solver: stranger, solution: 31n }))).toMatchObject(
        { code: PuzzleErrorCode.NOT_NFT_OWNER },
      );
    });

    it('refuses to write assets governed by another authority', () => {
      const { asset } = mintFactorPuzzle();
      const impostor = new PuzzleKernel(ledger, assets, {
        config: { ...config, authority_seed: 'other-seed' },
        entropy,
      });

      const error = captureError(() => impostor.solve({ asset_id: asset.id, solver: minter, solution: 31n }));

      expect(error).toMatchObject({ code: PuzzleErrorCode.UNAUTHORIZED_UPDATE });
      expect(ledger.getEvents()).toHaveLength(1);
    });

    it('updates the uri and logs it on behalf of the authority', () => {
      const { asset } = mintFactorPuzzle();

      const outcome = kernel.solve({
        asset_id: asset.id,
        solver: minter,
        solution: '6',
        new_uri: 'https://example.test/1-solved.json',
      });

      expect(outcome.asset.uri).toBe('https://example.test/1-solved.json');
      const events = ledger.getEvents();
      expect(events.map((event) => event.type)).toEqual(['PUZZLE_MINTED', 'PUZZLE_SOLVED', 'URI_UPDATED']);
      expect(events[2].uri_updated).toEqual({
        asset_id: asset.id,
        updated_by: kernel.authority.identity,
        uri: 'https://example.test/1-solved.json',
      });
    });

    it('rejects a stale expected revision', () => {
      const { asset } = mintFactorPuzzle();
      kernel.updateUri({ asset_id: asset.id, caller: kernel.authority.identity, uri: 'https://example.test/v2' });

      const error = captureError(() =>
        kernel.solve({ asset_id: asset.id, solver: minter, solution: 31n, expected_revision: 0 }),
      );

      expect(error).toBeInstanceOf(ExecutionError);
      expect(error).toMatchObject({ message: `stale asset revision: ${asset.id}` });
      expect(ledger.getEvents()).toHaveLength(2);
    });

    it('fails for an unknown asset', () => {
      const missing = identityFor('missing');
      expect(captureError(() => kernel.solve({ asset_id: missing, solver: minter, solution: 1n }))).toMatchObject({
        message: `asset not found: ${missing}`,
      });
    });

    it('accepts hash riddle preimages', () => {
      const { asset, minted } = kernel.mint({
        minter,
        name: 'Riddle',
        uri: '',
        puzzle_type_selector: 1,
        difficulty: 2,
      });
      expect(minted.puzzle_number).toBe('329');

      expect(captureError(() => kernel.solve({ asset_id: asset.id, solver: minter, solution: 1n }))).toMatchObject({
        code: PuzzleErrorCode.INCORRECT_SOLUTION,
      });
      expect(kernel.solve({ asset_id: asset.id, solver: minter, solution: 329 }).puzzle.solved).toBe(true);
    });
  });

  describe('updateUri', () => {
    it('lets the update authority change the uri', () => {
      const { asset } = mintFactorPuzzle();

      const outcome = kernel.updateUri({
        asset_id: asset.id,
        caller: kernel.authority.identity,
        uri: 'https://example.test/v2',
      });

      expect(outcome.asset.uri).toBe('https://example.test/v2');
      expect(outcome.event).toMatchObject({ type: 'URI_UPDATED', actor_id: kernel.authority.identity });
    });

    it('rejects the owner', () => {
      const { asset } = mintFactorPuzzle();
      expect(
        captureError(() => kernel.updateUri({ asset_id: asset.id, caller: minter, uri: 'https://example.test/v2' })),
      ).toMatchObject({ code: PuzzleErrorCode.UNAUTHORIZED_UPDATE });
      expect(assets.requireAsset(asset.id).uri).toBe('https://example.test/1.json');
    });
  });

  describe('transfer', () => {
    it('moves the solve right to the new owner', () => {
      const { asset } = mintFactorPuzzle();

      const outcome = kernel.transfer({ asset_id: asset.id, from: minter, to: buyer });

      expect(outcome.asset.owner).toBe(buyer);
      expect(assets.getHolding(asset.id)).toEqual({ asset_id: asset.id, owner: buyer, amount: 1 });
      expect(outcome.event.transferred).toEqual({ asset_id: asset.id, from: minter, to: buyer });
      expect(captureError(() => kernel.solve({ asset_id: asset.id, solver: minter, solution: 31n }))).toMatchObject({
        code: PuzzleErrorCode.NOT_NFT_OWNER,
      });
      expect(kernel.solve({ asset_id: asset.id, solver: buyer, solution: 31n }).solved.solver).toBe(buyer);
    });

    it('rejects a transfer by someone other than the owner', () => {
      const { asset } = mintFactorPuzzle();
      expect(captureError(() => kernel.transfer({ asset_id: asset.id, from: stranger, to: buyer }))).toMatchObject({
        code: PuzzleErrorCode.NOT_NFT_OWNER,
      });
    });
  });

  it('keeps the ledger hash chain intact', () => {
    const { asset } = mintFactorPuzzle();
    kernel.transfer({ asset_id: asset.id, from: minter, to: buyer });
    kernel.solve({ asset_id: asset.id, solver: buyer, solution: 93n, new_uri: 'https://example.test/done' });

    expect(ledger.verifyIntegrity()).toEqual({ ok: true, errors: [] });
    expect(ledger.listEventsByAsset(asset.id)).toHaveLength(4);
  });
});

describe('parseSolution', () => {
  it('accepts bigint, safe integers and decimal strings', () => {
    expect(parseSolution(31n)).toBe(31n);
    expect(parseSolution(31)).toBe(31n);
    expect(parseSolution(' 31 ')).toBe(31n);
    expect(parseSolution('18446744073709551615')).toBe(18446744073709551615n);
  });

  it.each([['-1'], ['0x1f'], ['18446744073709551616'], [1.5], [-3n]])('rejects %s', (value) => {
    expect(captureError(() => parseSolution(value))).toBeInstanceOf(ValidationError);
  });
});
