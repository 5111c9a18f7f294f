/**
 * Tests for the Electrum backend against an in-process server
 */

import { ElectrumClient, ElectrumServerError } from '../../src/backend/electrumClient';
import { ElectrumUrl } from '../../src/backend/electrumUrl';
import { electrumStatus, scriptHash } from '../../src/backend/types';
import { blockHash } from '../../src/transactions/header';
import { computeTxid, transactionToHex } from '../../src/transactions/serialization';
import type { Transaction } from '../../src/transactions/types';
import { ProtocolViolationError, TransportError } from '../../src/errors';
import { FakeElectrumServer } from '../helpers/electrumServer';
import { TESTNET_POLICY, fundingTx, headerHex, rawHeader, testnetDeriver } from '../helpers/fixtures';

describe('ElectrumClient', () => {
  const deriver = testnetDeriver();
  const script = deriver.script(0);
  const hash = scriptHash(script);
  let tx: Transaction;
  let txid: string;
  let server: FakeElectrumServer;
  let client: ElectrumClient;
  let url: ElectrumUrl;

  beforeAll(() => {
    tx = fundingTx(deriver, 0, TESTNET_POLICY, 1000);
    txid = computeTxid(tx);
  });

  beforeEach(async () => {
    server = new FakeElectrumServer();
    const port = await server.listen();
    url = ElectrumUrl.parse(`tcp://127.0.0.1:${port}`);
    client = new ElectrumClient('liquid-testnet', url, { timeout: 500 });
  });

  afterEach(async () => {
    client.close();
    await server.close();
  });

  test('negotiates the protocol version on connect', async () => {
    server.handlers.set('blockchain.headers.subscribe', () => ({ hex: headerHex(120), height: 120 }));

    await client.tip();

    expect(server.received).toEqual(['server.version', 'blockchain.headers.subscribe']);
  });

  test('tip decodes the header', async () => {
    server.handlers.set('blockchain.headers.subscribe', () => ({ hex: headerHex(120), height: 120 }));

    const tip = await client.tip();

    expect(tip.height).toBe(120);
    expect(tip.hash).toBe(blockHash(rawHeader(120)));
    expect(tip.time).toBe(1700000000 + 120 * 60);
  });

  test('tip rejects a height that disagrees with the header', async () => {
    server.handlers.set('blockchain.headers.subscribe', () => ({ hex: headerHex(120), height: 121 }));

    await expect(client.tip()).rejects.toThrow(
      new ProtocolViolationError('Tip header is at height 120, server reported 121')
    );
  });

  test('subscribe returns the server status', async () => {
    server.handlers.set('blockchain.scripthash.subscribe', params => {
      expect(params).toEqual([hash]);
      return 'ef'.repeat(32);
    });

    await expect(client.subscribe(script)).resolves.toBe('ef'.repeat(32));
  });

  test('a repeated subscribe computes the status from the history', async () => {
    server.handlers.set('blockchain.scripthash.subscribe', () => null);
    server.handlers.set('blockchain.scripthash.get_history', () => [{ tx_hash: txid, height: 0 }]);

    await expect(client.subscribe(script)).resolves.toBeNull();
    const status = await client.subscribe(script);

    expect(status).toBe(electrumStatus([{ txid, height: 0 }]));
    expect(server.count('blockchain.scripthash.subscribe')).toBe(1);
  });

  test('an already subscribed script falls back to the history', async () => {
    server.handlers.set('blockchain.scripthash.subscribe', () => {
      throw new Error('already subscribed');
    });
    server.handlers.set('blockchain.scripthash.get_history', () => [{ tx_hash: txid, height: 130 }]);

    await expect(client.subscribe(script)).resolves.toBe(electrumStatus([{ txid, height: 130 }]));
  });

  test('histories are batched and mempool heights become null', async () => {
    server.handlers.set('blockchain.scripthash.get_history', ([requested]) =>
      requested === hash
        ? [
            { tx_hash: 'aa'.repeat(32), height: 130 },
            { tx_hash: 'bb'.repeat(32), height: 0 },
            { tx_hash: 'cc'.repeat(32), height: -1 }
          ]
        : []
    );

    const histories = await client.histories([script, deriver.script(1)]);

    expect(histories).toEqual([
      [
        { txid: 'aa'.repeat(32), height: 130 },
        { txid: 'bb'.repeat(32), height: null },
        { txid: 'cc'.repeat(32), height: null }
      ],
      []
    ]);
  });

  test('rejects a malformed history', async () => {
    server.handlers.set('blockchain.scripthash.get_history', () => [{ tx_hash: txid }]);

    await expect(client.histories([script])).rejects.toThrow(new ProtocolViolationError('Malformed history item'));
  });

  test('transactions are decoded', async () => {
    server.handlers.set('blockchain.transaction.get', ([requested]) => {
      expect(requested).toBe(txid);
      return transactionToHex(tx);
    });

    const [body] = await client.transactions([txid]);

    expect(computeTxid(body)).toBe(txid);
  });

  test('headers are fetched by height', async () => {
    server.handlers.set('blockchain.block.header', ([height]) => headerHex(Number(height)));

    const headers = await client.headers([7, 9]);

    expect(headers.map(h => h.height)).toEqual([7, 9]);
  });

  test('server errors name the method', async () => {
    server.handlers.set('blockchain.transaction.broadcast', () => {
      throw new Error('bad-txns-inputs-missingorspent');
    });

    const error = await client.broadcast(tx).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ElectrumServerError);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'blockchain.transaction.broadcast: bad-txns-inputs-missingorspent');
  });

  test('broadcast returns the txid', async () => {
    server.handlers.set('blockchain.transaction.broadcast', () => txid);

    await expect(client.broadcast(tx)).resolves.toBe(txid);
  });

  test('a dropped connection fails pending requests and reconnects', async () => {
    server.hangUpOn.add('blockchain.transaction.get');
    await expect(client.transactions([txid])).rejects.toThrow(`Connection lost to ${url.toString()}`);

    server.hangUpOn.clear();
    server.handlers.set('blockchain.transaction.get', () => transactionToHex(tx));
    await client.transactions([txid]);

    expect(server.count('server.version')).toBe(2);
  });

  test('an unanswered request times out', async () => {
    client = new ElectrumClient('liquid-testnet', url, { timeout: 50 });

    await expect(client.headers([1])).rejects.toThrow('blockchain.block.header timed out after 50ms');
  });

  test('cannot connect to a closed port', async () => {
    const closed = new FakeElectrumServer();
    const port = await closed.listen();
    await closed.close();
    const unreachable = ElectrumUrl.parse(`tcp://127.0.0.1:${port}`);

    await expect(new ElectrumClient('liquid-testnet', unreachable).tip()).rejects.toThrow(
      `Cannot connect to ${unreachable.toString()}`
    );
  });
});
