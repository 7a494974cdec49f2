import { describe, it, expect, vi } from 'vitest';
import type { TokenCredential } from '@azure/identity';
import { TUNNEL_AUTH_HEADER, TUNNEL_SERVICE_SCOPE, buildTunnelHeaders, isDevTunnelUrl } from './tunnel-auth.js';
import { MemoryLogger } from '../../test/support/fakes.js';

const TUNNEL_URL = new URL('https://abc123-8080.usw2.devtunnels.ms/mcp');

function fakeCredential(getToken: TokenCredential['getToken']): TokenCredential {
  return { getToken };
}

describe('isDevTunnelUrl', () => {
  it.each([
    ['https://abc123-8080.usw2.devtunnels.ms/mcp', true],
    ['https://DEVTUNNELS.MS/mcp', true],
    ['http://localhost:8080/mcp', false],
    ['https://devtunnels.ms.example.com/mcp', false],
    ['https://notdevtunnels.ms/mcp', false],
  ])('%s -> %s', (url, expected) => {
    expect(isDevTunnelUrl(new URL(url))).toBe(expected);
  });
});

describe('buildTunnelHeaders', () => {
  it('adds nothing for other hosts', async () => {
    const getToken = vi.fn<TokenCredential['getToken']>();

    const headers = await buildTunnelHeaders(new URL('http://localhost:8080/mcp'), {
      accessToken: 'test-token',
      credential: fakeCredential(getToken),
      logger: new MemoryLogger(),
    });

    expect(headers).toEqual({});
    expect(getToken).not.toHaveBeenCalled();
  });

  it('prefers the configured access token', async () => {
    const getToken = vi.fn<TokenCredential['getToken']>();

    const headers = await buildTunnelHeaders(TUNNEL_URL, {
      accessToken: 'test-token',
      credential: fakeCredential(getToken),
      logger: new MemoryLogger(),
    });

    expect(headers).toEqual({ [TUNNEL_AUTH_HEADER]: 'tunnel test-token' });
    expect(getToken).not.toHaveBeenCalled();
  });

  it('asks the credential for a tunnel service token', async () => {
    const getToken = vi.fn<TokenCredential['getToken']>(async () => ({
      token: 'credential-token',
      expiresOnTimestamp: Date.now() + 60_000,
    }));

    const headers = await buildTunnelHeaders(TUNNEL_URL, {
      credential: fakeCredential(getToken),
      logger: new MemoryLogger(),
    });

    expect(headers).toEqual({ 'X-Tunnel-Authorization': 'tunnel credential-token' });
    expect(getToken).toHaveBeenCalledWith(TUNNEL_SERVICE_SCOPE);
  });

  it('proceeds anonymously when the credential fails', async () => {
    const logger = new MemoryLogger();
    const getToken = vi.fn<TokenCredential['getToken']>(async () => {
      throw new Error('no az login');
    });

    const headers = await buildTunnelHeaders(TUNNEL_URL, { credential: fakeCredential(getToken), logger });

    expect(headers).toEqual({});
    expect(logger.messages('warn')).toEqual([
      'Could not get a dev tunnel token from the Azure credential',
      'Dev tunnel URL without credentials; set DEVTUNNEL_ACCESS_TOKEN or allow anonymous access',
    ]);
  });

  it('proceeds anonymously without any credentials', async () => {
    const logger = new MemoryLogger();

    expect(await buildTunnelHeaders(TUNNEL_URL, { logger })).toEqual({});
    expect(logger.entries[0]?.context).toEqual({ operation: 'tunnel-auth', host: 'abc123-8080.usw2.devtunnels.ms' });
  });
});
