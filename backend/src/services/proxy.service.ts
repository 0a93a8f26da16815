/**
 * Proxy rotation
 * Parses the configured proxy list and hands proxies out round-robin, so a run that
 * keeps failing walks the whole list before it reuses one.
 */

import type { ProxyEndpoint } from '../interfaces/types';
import { ConfigError } from '../utils/errors';

const PROTOCOLS: ReadonlyArray<ProxyEndpoint['protocol']> = ['http', 'https', 'socks4', 'socks5'];

function isProtocol(value: string): value is ProxyEndpoint['protocol'] {
  return PROTOCOLS.some(p => p === value);
}

function parsePort(raw: string, proxyStr: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid proxy port in '${proxyStr}'`);
  }
  return port;
}

export class ProxyRotator {
  private proxies: ProxyEndpoint[];
  private currentIndex = 0;
  private current: ProxyEndpoint | null = null;

  constructor(proxies: ProxyEndpoint[] = []) {
    this.proxies = [...proxies];
  }

  get size(): number {
    return this.proxies.length;
  }

  hasProxies(): boolean {
    return this.proxies.length > 0;
  }

  /**
   * Next proxy in round-robin order, or null when running without proxies
   */
  next(): ProxyEndpoint | null {
    if (this.proxies.length === 0) return null;
    const proxy = this.proxies[this.currentIndex];
    this.currentIndex = (this.currentIndex + 1) % this.proxies.length;
    this.current = proxy;
    return proxy;
  }

  getCurrent(): ProxyEndpoint | null {
    return this.current;
  }

  static describe(proxy: ProxyEndpoint): string {
    return `${proxy.host}:${proxy.port}`;
  }

  /**
   * Playwright's launch `proxy` option
   */
  static toPlaywright(proxy: ProxyEndpoint): { server: string; username?: string; password?: string } {
    return {
      server: `${proxy.protocol}://${proxy.host}:${proxy.port}`,
      username: proxy.username,
      password: proxy.password,
    };
  }

  /**
   * Accepts `host:port`, `host:port:username:password` or `protocol://[user:pass@]host:port`
   */
  static parse(proxyStr: string): ProxyEndpoint {
    const trimmed = proxyStr.trim();

    if (trimmed.includes('://')) {
      let url: URL;
      try {
        url = new URL(trimmed);
      } catch {
        throw new ConfigError(`Invalid proxy '${trimmed}'`);
      }
      const protocol = url.protocol.replace(':', '');
      if (!isProtocol(protocol)) {
        throw new ConfigError(`Unsupported proxy protocol '${protocol}' in '${trimmed}'`);
      }
      if (!url.hostname || !url.port) {
        throw new ConfigError(`Proxy '${trimmed}' needs a host and a port`);
      }
      return {
        protocol,
        host: url.hostname,
        port: parsePort(url.port, trimmed),
        username: url.username ? decodeURIComponent(url.username) : undefined,
        password: url.password ? decodeURIComponent(url.password) : undefined,
      };
    }

    const parts = trimmed.split(':');
    if (parts.length === 2 && parts[0]) {
      return { protocol: 'http', host: parts[0], port: parsePort(parts[1], trimmed) };
    }
    if (parts.length === 4 && parts[0]) {
      return {
        protocol: 'http',
        host: parts[0],
        port: parsePort(parts[1], trimmed),
        username: parts[2],
        password: parts[3],
      };
    }

    throw new ConfigError(`Invalid proxy '${trimmed}' encountered in the proxy list`);
  }

  /**
   * Comma or newline separated list; blank entries are ignored
   */
  static parseList(list: string): ProxyEndpoint[] {
    return list
      .split(/[,\r\n]+/)
      .map(s => s.trim())
      .filter(Boolean)
      .map(s => ProxyRotator.parse(s));
  }
}
