/**
 * Central mock exports for testing
 */

export {
  FakeMCPServer,
  InMemoryTransport,
  createInMemoryTransportFactory,
  CALCULATOR_TOOLS,
  CALCULATOR_RESOURCES,
  CALCULATOR_TEMPLATES,
  type FakeServerOptions,
  type InMemoryTransportOptions,
} from "./mcp-server.js";
