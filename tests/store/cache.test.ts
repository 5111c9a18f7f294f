/**
 * Tests for cache state consistency and its persisted form
 */

import {
  cloneState,
  deserializeState,
  emptyState,
  findInconsistency,
  serializeState
} from '../../src/store/cache';
import { StorageError } from '../../src/errors';
import { sampleState } from '../helpers/fixtures';

describe('findInconsistency', () => {
  test('accepts empty and sample states', () => {
    expect(findInconsistency(emptyState())).toBeNull();
    expect(findInconsistency(sampleState())).toBeNull();
  });

  test('flags a height without a body', () => {
    const state = emptyState();
    state.tip = { height: 5, hash: '00'.repeat(32) };
    state.heights.set('aa'.repeat(32), 5);
    expect(findInconsistency(state)).toBe(`height recorded for unknown transaction ${'aa'.repeat(32)}`);
  });

  test('flags a body without a height', () => {
    const state = sampleState();
    const [txid] = [...state.heights.keys()];
    state.heights.delete(txid);
    expect(findInconsistency(state)).toBe(`transaction ${txid} has no height entry`);
  });

  test('flags unblinded outputs without a transaction output', () => {
    const state = sampleState();
    const [txid] = [...state.transactions.keys()];
    state.unblinded.set(`${txid}:9`, {
      asset: 'aa'.repeat(32),
      value: 1,
      assetBlindingFactor: '00'.repeat(32),
      valueBlindingFactor: '00'.repeat(32)
    });
    expect(findInconsistency(state)).toBe(`unblinded output ${txid}:9 has no transaction output`);
  });

  test('flags a tip below a confirmed height', () => {
    const state = sampleState();
    state.tip = { height: 9, hash: 'ab'.repeat(32) };
    expect(findInconsistency(state)).toBe('tip is below confirmed height 10');
  });

  test('flags an invalid last index', () => {
    const state = emptyState();
    state.lastIndex = -2;
    expect(findInconsistency(state)).toBe('invalid last index -2');
  });
});

describe('cloneState', () => {
  test('copies containers so drafts do not leak', () => {
    const original = sampleState();
    const draft = cloneState(original);
    draft.heights.clear();
    draft.lastIndex = 7;

    expect(original.heights.size).toBe(1);
    expect(original.lastIndex).toBe(0);
  });
});

describe('persisted form', () => {
  test('round-trips every part of the state', () => {
    const state = sampleState();
    const restored = deserializeState(serializeState(state));

    expect(restored.tip).toEqual(state.tip);
    expect(restored.headers).toEqual(state.headers);
    expect(restored.scripts).toEqual(state.scripts);
    expect(restored.subscriptions).toEqual(state.subscriptions);
    expect(restored.heights).toEqual(state.heights);
    expect(restored.unblinded).toEqual(state.unblinded);
    expect(restored.lastIndex).toBe(0);
    expect([...restored.transactions.keys()]).toEqual([...state.transactions.keys()]);
  });

  test('round-trips an empty state', () => {
    const restored = deserializeState(serializeState(emptyState()));
    expect(restored.tip).toBeNull();
    expect(restored.lastIndex).toBeUndefined();
    expect(restored.transactions.size).toBe(0);
  });

  test('rejects text that is not JSON', () => {
    expect(() => deserializeState('{nope')).toThrow('Corrupted wallet state: not JSON');
  });

  test('rejects other format versions', () => {
    expect(() => deserializeState(JSON.stringify({ version: 2 }))).toThrow(
      'Corrupted wallet state: unsupported format version'
    );
  });

  test('rejects a transaction stored under the wrong id', () => {
    const persisted = JSON.parse(serializeState(sampleState()));
    const wrongId = 'ee'.repeat(32);
    persisted.transactions[0][0] = wrongId;
    expect(() => deserializeState(JSON.stringify(persisted))).toThrow(
      `Corrupted wallet state: transaction ${wrongId} does not hash to its id`
    );
  });

  test('rejects states that break consistency', () => {
    const persisted = JSON.parse(serializeState(sampleState()));
    persisted.tip.height = 3;
    expect(() => deserializeState(JSON.stringify(persisted))).toThrow(
      'Corrupted wallet state: tip is below confirmed height 10'
    );
  });

  test('rejects malformed entries', () => {
    const persisted = JSON.parse(serializeState(sampleState()));
    persisted.unblinded[0][1].value = 'lots';
    expect(() => deserializeState(JSON.stringify(persisted))).toThrow(StorageError);
  });
});
