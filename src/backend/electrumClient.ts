/**
 * ElectrumClient - TCP/TLS Electrum protocol backend
 *
 * Newline-delimited JSON-RPC over a single socket. Batches go out as one
 * JSON array per line and responses are matched back by id. The socket is
 * opened lazily and re-opened on the next request after it drops.
 */

import { connect as netConnect, type Socket } from 'node:net';
import { connect as tlsConnect } from 'node:tls';
import type { BlockHeader, HistoryEntry, Network } from '../types/index';
import type { Transaction } from '../transactions/types';
import { decodeTransaction, transactionToHex } from '../transactions/serialization';
import { parseBlockHeader } from '../transactions/header';
import { ProtocolViolationError, TransportError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import {
  confirmationHeight,
  electrumStatus,
  scriptHash,
  type BlockchainBackend,
  type RawHistoryItem
} from './types';
import type { ElectrumUrl } from './electrumUrl';

const log = createLogger('Electrum');

const PROTOCOL_VERSION = '1.4';
const CLIENT_NAME = 'confidential-wallet-store';
const DEFAULT_TIMEOUT = 30000;

export interface ElectrumOptions {
  /** Connect and per-request timeout in milliseconds */
  timeout?: number;
}

interface ElectrumCall {
  method: string;
  params: unknown[];
}

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * JSON-RPC error object reported by the server
 */
export class ElectrumServerError extends TransportError {
  constructor(
    readonly method: string,
    message: string
  ) {
    super(`${method}: ${message}`);
    this.name = 'ElectrumServerError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw new ProtocolViolationError(`Expected ${what} to be a string`);
  }
  return value;
}

function parseHistory(value: unknown): RawHistoryItem[] {
  if (!Array.isArray(value)) {
    throw new ProtocolViolationError('History response is not a list');
  }
  return value.map(item => {
    if (!isRecord(item) || typeof item.tx_hash !== 'string' || typeof item.height !== 'number') {
      throw new ProtocolViolationError('Malformed history item');
    }
    return { txid: item.tx_hash, height: item.height };
  });
}

function serverErrorMessage(error: unknown): string {
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}

export class ElectrumClient implements BlockchainBackend {
  private socket: Socket | null = null;
  private connecting: Promise<Socket> | null = null;
  private buffer = '';
  private requestId = 0;
  private readonly pending: Map<number, PendingRequest> = new Map();
  private readonly subscribed: Set<string> = new Set();
  private readonly timeout: number;

  constructor(
    readonly network: Network,
    readonly url: ElectrumUrl,
    options: ElectrumOptions = {}
  ) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
  }

  // ============================================
  // Connection
  // ============================================

  private open(): Promise<Socket> {
    if (this.socket) {
      return Promise.resolve(this.socket);
    }
    if (!this.connecting) {
      this.connecting = this.dial().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private dial(): Promise<Socket> {
    return new Promise<Socket>((resolve, reject) => {
      const { host, port } = this.url;
      const readyEvent = this.url.tls ? 'secureConnect' : 'connect';
      const socket = this.url.tls
        ? tlsConnect({ host, port, servername: host, rejectUnauthorized: this.url.validateDomain })
        : netConnect({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new TransportError(`Connection to ${this.url.toString()} timed out`));
      }, this.timeout);

      socket.setEncoding('utf8');
      socket.once(readyEvent, () => {
        clearTimeout(timer);
        this.socket = socket;
        this.subscribed.clear();
        log.debug('connected', { url: this.url.toString() });
        resolve(socket);
      });
      socket.on('data', (chunk: string) => this.handleData(chunk));
      socket.on('error', error => {
        clearTimeout(timer);
        log.warn('socket error', { url: this.url.toString(), error: error.message });
        reject(new TransportError(`Cannot connect to ${this.url.toString()}`, { cause: error }));
      });
      socket.on('close', () => this.handleClose());
    }).then(async socket => {
      await this.send([{ method: 'server.version', params: [CLIENT_NAME, PROTOCOL_VERSION] }], socket);
      return socket;
    });
  }

  private handleClose(): void {
    this.socket = null;
    this.buffer = '';
    for (const [id, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(new TransportError(`Connection lost to ${this.url.toString()}`));
      this.pending.delete(id);
    }
  }

  /**
   * Close the socket; in-flight requests fail with a transport error
   */
  close(): void {
    this.socket?.destroy();
    this.socket = null;
  }

  // ============================================
  // Data Handling
  // ============================================

  private handleData(chunk: string): void {
    this.buffer += chunk;

    let newline: number;
    while ((newline = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        log.warn('unparseable line from server', { error: errorMessage(error) });
        continue;
      }

      const messages: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
      for (const message of messages) {
        this.handleMessage(message);
      }
    }
  }

  private handleMessage(message: unknown): void {
    if (!isRecord(message)) return;

    if (typeof message.method === 'string' && message.id === undefined) {
      log.debug('notification', { method: message.method });
      return;
    }

    if (typeof message.id !== 'number') return;
    const request = this.pending.get(message.id);
    if (!request) return;

    clearTimeout(request.timer);
    this.pending.delete(message.id);
    if (message.error !== undefined && message.error !== null) {
      request.reject(new Error(serverErrorMessage(message.error)));
    } else {
      request.resolve(message.result);
    }
  }

  // ============================================
  // Requests
  // ============================================

  private send(calls: ElectrumCall[], socket: Socket): Promise<unknown[]> {
    const requests = calls.map(call => ({ id: ++this.requestId, method: call.method, params: call.params }));

    const results = requests.map(
      request =>
        new Promise<unknown>((resolve, reject) => {
          const timer = setTimeout(() => {
            this.pending.delete(request.id);
            reject(new TransportError(`${request.method} timed out after ${this.timeout}ms`));
          }, this.timeout);
          this.pending.set(request.id, {
            resolve,
            reject: error =>
              reject(error instanceof TransportError ? error : new ElectrumServerError(request.method, error.message)),
            timer
          });
        })
    );

    const payload = requests.length === 1 ? requests[0] : requests;
    socket.write(JSON.stringify(payload) + '\n');
    return Promise.all(results);
  }

  private async batch(calls: ElectrumCall[]): Promise<unknown[]> {
    if (calls.length === 0) {
      return [];
    }
    const socket = await this.open();
    const results = await this.send(calls, socket);
    if (results.length !== calls.length) {
      throw new ProtocolViolationError(`Expected ${calls.length} results, got ${results.length}`);
    }
    return results;
  }

  private async call(method: string, params: unknown[]): Promise<unknown> {
    const [result] = await this.batch([{ method, params }]);
    return result;
  }

  // ============================================
  // BlockchainBackend
  // ============================================

  async tip(): Promise<BlockHeader> {
    const result = await this.call('blockchain.headers.subscribe', []);
    if (!isRecord(result) || typeof result.hex !== 'string' || typeof result.height !== 'number') {
      throw new ProtocolViolationError('Malformed headers.subscribe response');
    }
    const header = parseBlockHeader(result.hex);
    if (header.height !== result.height) {
      throw new ProtocolViolationError(`Tip header is at height ${header.height}, server reported ${result.height}`);
    }
    return header;
  }

  async subscribe(script: Uint8Array): Promise<string | null> {
    const hash = scriptHash(script);

    if (this.subscribed.has(hash)) {
      return this.statusFromHistory(hash);
    }

    let status: unknown;
    try {
      status = await this.call('blockchain.scripthash.subscribe', [hash]);
    } catch (error) {
      if (error instanceof ElectrumServerError && /already subscribed/i.test(error.message)) {
        this.subscribed.add(hash);
        return this.statusFromHistory(hash);
      }
      throw error;
    }

    if (status !== null && typeof status !== 'string') {
      throw new ProtocolViolationError('Malformed scripthash status');
    }
    this.subscribed.add(hash);
    return status;
  }

  private async statusFromHistory(hash: string): Promise<string | null> {
    const history = parseHistory(await this.call('blockchain.scripthash.get_history', [hash]));
    return electrumStatus(history);
  }

  async histories(scripts: Uint8Array[]): Promise<HistoryEntry[][]> {
    const results = await this.batch(
      scripts.map(script => ({ method: 'blockchain.scripthash.get_history', params: [scriptHash(script)] }))
    );
    return results.map(result =>
      parseHistory(result).map(item => ({ txid: item.txid, height: confirmationHeight(item.height) }))
    );
  }

  async transactions(txids: string[]): Promise<Transaction[]> {
    const results = await this.batch(txids.map(txid => ({ method: 'blockchain.transaction.get', params: [txid] })));
    return results.map(result => decodeTransaction(expectString(result, 'raw transaction')));
  }

  async headers(heights: number[]): Promise<BlockHeader[]> {
    const results = await this.batch(heights.map(height => ({ method: 'blockchain.block.header', params: [height] })));
    return results.map(result => parseBlockHeader(expectString(result, 'raw header')));
  }

  async broadcast(tx: Transaction): Promise<string> {
    const result = await this.call('blockchain.transaction.broadcast', [transactionToHex(tx)]);
    return expectString(result, 'broadcast txid');
  }

  toString(): string {
    return `ElectrumClient(${this.url.toString()}, ${this.network})`;
  }
}
