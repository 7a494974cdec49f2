import type { TokenCredential } from '@azure/identity';
import { errorMessage } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';

/** Host suffix of Microsoft dev tunnels */
export const DEVTUNNEL_HOST_SUFFIX = 'devtunnels.ms';

/** Scope of the Visual Studio tunnel service */
export const TUNNEL_SERVICE_SCOPE = '499b84ac-1321-427f-aa17-267ca6975798/.default';

export const TUNNEL_AUTH_HEADER = 'X-Tunnel-Authorization';

export interface TunnelAuthOptions {
  accessToken?: string;
  credential?: TokenCredential;
  logger: Logger;
}

export function isDevTunnelUrl(url: URL): boolean {
  const host = url.hostname.toLowerCase();
  return host === DEVTUNNEL_HOST_SUFFIX || host.endsWith(`.${DEVTUNNEL_HOST_SUFFIX}`);
}

/**
 * Headers to attach to every tool server request.
 *
 * Only dev tunnel URLs get a tunnel header. A configured access token is
 * used as is; otherwise the credential is asked for a tunnel service token.
 * Without either the request goes out anonymously.
 */
export async function buildTunnelHeaders(url: URL, options: TunnelAuthOptions): Promise<Record<string, string>> {
  if (!isDevTunnelUrl(url)) {
    return {};
  }

  if (options.accessToken) {
    await options.logger.debug('Using configured dev tunnel access token', { operation: 'tunnel-auth' });
    return { [TUNNEL_AUTH_HEADER]: `tunnel ${options.accessToken}` };
  }

  if (options.credential) {
    try {
      const token = await options.credential.getToken(TUNNEL_SERVICE_SCOPE);
      if (token) {
        await options.logger.debug('Using Azure credential for dev tunnel', { operation: 'tunnel-auth' });
        return { [TUNNEL_AUTH_HEADER]: `tunnel ${token.token}` };
      }
    } catch (error) {
      await options.logger.warn('Could not get a dev tunnel token from the Azure credential', {
        operation: 'tunnel-auth',
        error: errorMessage(error),
      });
    }
  }

  await options.logger.warn('Dev tunnel URL without credentials; set DEVTUNNEL_ACCESS_TOKEN or allow anonymous access', {
    operation: 'tunnel-auth',
    host: url.hostname,
  });
  return {};
}
