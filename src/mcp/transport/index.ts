/**
 * Transport selection
 */

import type { MCPConnectionParams, MCPTransport } from "../types.js";
import { MCPConfigurationError } from "../errors.js";
import { StdioTransport } from "./stdio.js";
import { SSETransport } from "./sse.js";
import type { MCPLogger } from "../../utils/logger.js";

export { StdioTransport, type StdioTransportConfig } from "./stdio.js";
export { SSETransport, type SSETransportConfig } from "./sse.js";

/**
 * Build the (not yet connected) transport described by `params`
 */
export function openTransport(
  params: MCPConnectionParams,
  options: { logger?: MCPLogger } = {},
): MCPTransport {
  switch (params.transport) {
    case "stdio":
      return new StdioTransport({
        command: params.command,
        args: params.args,
        env: params.env,
        cwd: params.cwd,
        logger: options.logger,
      });

    case "sse":
      return new SSETransport({
        url: params.baseUrl,
        headers: params.headers,
        apiKey: params.apiKey,
        logger: options.logger,
      });

    default: {
      const unknown: { transport: string } = params;
      throw new MCPConfigurationError(`Transport '${unknown.transport}' is not supported`);
    }
  }
}
