/**
 * Electrum server URL: `tcp://host:port` or `ssl://host:port`
 */

import { isIP } from 'node:net';
import { ElectrumUrlError } from '../errors';

export class ElectrumUrl {
  constructor(
    readonly host: string,
    readonly port: number,
    readonly tls: boolean,
    readonly validateDomain: boolean
  ) {
    if (validateDomain && !tls) {
      throw new ElectrumUrlError('Cannot validate domain without tls');
    }
  }

  static parse(value: string): ElectrumUrl {
    let url: URL;
    try {
      url = new URL(value);
    } catch (error) {
      throw new ElectrumUrlError('relative URL without a base', { cause: error });
    }

    const scheme = url.protocol.replace(/:$/, '');
    const ssl = scheme === 'ssl';
    if (!ssl && scheme !== 'tcp') {
      throw new ElectrumUrlError(`Invalid schema \`${scheme}\` supported ones are \`ssl\` or \`tcp\``);
    }
    if (url.port === '') {
      throw new ElectrumUrlError('Port is missing');
    }
    if (url.hostname === '') {
      throw new ElectrumUrlError('Domain is missing');
    }

    const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
    if (isIP(host) !== 0) {
      if (ssl) {
        throw new ElectrumUrlError('Cannot specify `ssl` scheme without a domain');
      }
      return new ElectrumUrl(host, Number(url.port), false, false);
    }
    return new ElectrumUrl(host, Number(url.port), ssl, ssl);
  }

  get hostPort(): string {
    return isIP(this.host) === 6 ? `[${this.host}]:${this.port}` : `${this.host}:${this.port}`;
  }

  toString(): string {
    return `${this.tls ? 'ssl' : 'tcp'}://${this.hostPort}`;
  }
}
