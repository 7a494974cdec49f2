/**
 * MCP - tool server connection and dev tunnel authentication
 */

export {
  McpToolServerConnection,
  connectToolServer,
  classifyToolServerError,
  type CallOptions,
  type ConnectOptions,
  type ToolServerConfig,
  type ToolServerConnection,
} from './connection.js';

export {
  buildTunnelHeaders,
  isDevTunnelUrl,
  DEVTUNNEL_HOST_SUFFIX,
  TUNNEL_AUTH_HEADER,
  TUNNEL_SERVICE_SCOPE,
  type TunnelAuthOptions,
} from './tunnel-auth.js';
