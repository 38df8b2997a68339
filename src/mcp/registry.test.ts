/**
 * Tests for MCP Server Registry
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { MCPServerRegistry, createMCPServerRegistry } from "./registry.js";
import { MCPClientImpl } from "./client.js";
import { createConnectionParams } from "./config.js";
import {
  MCPConfigurationError,
  MCPConnectionError,
  MCPServerNotFoundError,
  MCPStateError,
} from "./errors.js";
import type { MCPConnectionParams } from "./types.js";
import { createLogger } from "../utils/logger.js";
import {
  FakeMCPServer,
  InMemoryTransport,
  createInMemoryTransportFactory,
} from "../../test/mocks/index.js";

const logger = createLogger({ name: "test", level: "fatal" });

function stdio(command: string): MCPConnectionParams {
  return createConnectionParams({ command }, {});
}

describe("MCPServerRegistry", () => {
  let transports: InMemoryTransport[];
  let registry: MCPServerRegistry;

  beforeEach(() => {
    const created = createInMemoryTransportFactory((params) => {
      const command = params.transport === "stdio" ? params.command : "";
      if (command === "broken-server") {
        return new InMemoryTransport(new FakeMCPServer(), {
          connectError: new MCPConnectionError("Failed to spawn 'broken-server': ENOENT"),
        });
      }
      if (command === "flaky-server") {
        return new InMemoryTransport(new FakeMCPServer(), {
          disconnectError: new Error("flaky-server did not exit"),
        });
      }
      return new InMemoryTransport(new FakeMCPServer({ name: command }));
    });
    transports = created.transports;
    registry = createMCPServerRegistry({ transportFactory: created.factory, logger });
  });

  describe("connectToServer", () => {
    it("should register a server once it is ready", async () => {
      const client = await registry.connectToServer("calc", stdio("calc-server"));

      expect(client.state).toBe("ready");
      expect(registry.getClient("calc")).toBe(client);
      expect(registry.hasServer("calc")).toBe(true);
      expect(registry.getServerNames()).toEqual(["calc"]);
    });

    it("should reject a duplicate name", async () => {
      await registry.connectToServer("calc", stdio("calc-server"));

      await expect(registry.connectToServer("calc", stdio("other-server"))).rejects.toThrow(
        new MCPConfigurationError("Server 'calc' is already connected"),
      );
      expect(transports).toHaveLength(1);
    });

    it("should reject a name that is still connecting", async () => {
      const first = registry.connectToServer("calc", stdio("calc-server"));
      const second = registry.connectToServer("calc", stdio("calc-server"));

      await expect(second).rejects.toThrow(MCPConfigurationError);
      await expect(first).resolves.toMatchObject({ state: "ready" });
    });

    it("should reject an empty name", async () => {
      await expect(registry.connectToServer(" ", stdio("calc-server"))).rejects.toThrow(
        "Server name must be a non-empty string",
      );
    });

    it("should not register a server that fails to connect", async () => {
      await expect(registry.connectToServer("calc", stdio("broken-server"))).rejects.toThrow(
        MCPConnectionError,
      );

      expect(registry.hasServer("calc")).toBe(false);
      await expect(registry.connectToServer("calc", stdio("calc-server"))).resolves.toBeDefined();
    });

    it("should use a custom client factory", async () => {
      const clientFactory = vi.fn(
        (name: string, params: MCPConnectionParams) =>
          new MCPClientImpl(params, { name, transportFactory: () => new InMemoryTransport(), logger }),
      );
      const custom = new MCPServerRegistry({ clientFactory, logger });

      await custom.connectToServer("calc", stdio("calc-server"));

      expect(clientFactory).toHaveBeenCalledWith("calc", stdio("calc-server"));
    });
  });

  describe("connectAll", () => {
    it("should connect in order and collect failures", async () => {
      const result = await registry.connectAll({
        calc: stdio("calc-server"),
        broken: stdio("broken-server"),
        notes: stdio("notes-server"),
      });

      expect(result.connected).toEqual(["calc", "notes"]);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0]?.name).toBe("broken");
      expect(result.failed[0]?.error.message).toBe("Failed to spawn 'broken-server': ENOENT");
      expect(registry.getServerNames()).toEqual(["calc", "notes"]);
    });
  });

  describe("getTools", () => {
    it("should return tools of every server in registration order", async () => {
      await registry.connectToServer("calc", stdio("calc-server"));
      await registry.connectToServer("notes", stdio("notes-server"));

      const tools = await registry.getTools();

      expect(tools.map((t) => t.qualifiedName)).toEqual([
        "calc_add",
        "calc_multiply",
        "notes_add",
        "notes_multiply",
      ]);
    });

    it("should skip servers that became unreachable", async () => {
      await registry.connectToServer("calc", stdio("calc-server"));
      await registry.connectToServer("notes", stdio("notes-server"));
      transports[0]?.drop();

      const tools = await registry.getTools();

      expect(tools.map((t) => t.serverName)).toEqual(["notes", "notes"]);
    });

    it("should route bound tools to their own server", async () => {
      await registry.connectToServer("calc", stdio("calc-server"));
      await registry.connectToServer("notes", stdio("notes-server"));

      const tools = await registry.getTools();
      const multiply = tools.find((t) => t.qualifiedName === "notes_multiply");

      await expect(multiply?.execute({ a: 6, b: 7 })).resolves.toBe("42");
      expect(transports[1]?.server.requests("tools/call")).toHaveLength(1);
      expect(transports[0]?.server.requests("tools/call")).toHaveLength(0);
    });
  });

  describe("routing", () => {
    beforeEach(async () => {
      await registry.connectToServer("calc", stdio("calc-server"));
    });

    it("should call a tool by server name", async () => {
      const result = await registry.callTool("calc", "add", { a: 2, b: 3 });

      expect(result.content).toEqual([{ type: "text", text: "5" }]);
    });

    it("should read resources and prompts by server name", async () => {
      await registry.callTool("calc", "multiply", { a: 3, b: 3 });

      await expect(registry.readResource("calc", "calc://current")).resolves.toEqual([
        { uri: "calc://current", mimeType: "text/plain", text: "9" },
      ]);
      await expect(registry.listPrompts("calc")).resolves.toHaveLength(1);
      await expect(registry.getPrompt("calc", "explain", { expression: "3 * 3" })).resolves.toEqual([
        { role: "user", content: { type: "text", text: "Explain how to compute 3 * 3" } },
      ]);
      await expect(registry.getServerMetadata("calc")).resolves.toMatchObject({ name: "calc-server" });
    });

    it("should subscribe and unsubscribe by server name", async () => {
      await registry.subscribeToResource("calc", "calc://history");
      expect(transports[0]?.server.subscriptions.has("calc://history")).toBe(true);

      await registry.unsubscribeFromResource("calc", "calc://history");
      expect(transports[0]?.server.subscriptions.size).toBe(0);
    });

    it("should reject unknown server names", async () => {
      await expect(registry.callTool("nope", "add")).rejects.toThrow(
        new MCPServerNotFoundError("nope", ["calc"]),
      );
    });

    it("should surface connection loss on an unreachable server", async () => {
      transports[0]?.drop();

      await expect(registry.listResources("calc")).rejects.toThrow(MCPConnectionError);
    });
  });

  describe("close", () => {
    it("should close every server even when one fails", async () => {
      const flaky = await registry.connectToServer("flaky", stdio("flaky-server"));
      const calc = await registry.connectToServer("calc", stdio("calc-server"));

      await expect(registry.close()).rejects.toThrow("flaky-server did not exit");

      expect(flaky.state).toBe("closed");
      expect(calc.state).toBe("closed");
      expect(transports[1]?.disconnectCalls).toBe(1);
      expect(registry.getServerNames()).toEqual([]);
    });

    it("should share one close between callers", async () => {
      await registry.connectToServer("calc", stdio("calc-server"));

      await Promise.all([registry.close(), registry.close()]);

      expect(transports[0]?.disconnectCalls).toBe(1);
    });

    it("should refuse new connections after close", async () => {
      await registry.close();

      await expect(registry.connectToServer("calc", stdio("calc-server"))).rejects.toThrow(
        MCPStateError,
      );
    });

    it("should close a server that finishes connecting after close", async () => {
      const pending = registry.connectToServer("calc", stdio("calc-server"));
      await registry.close();

      await expect(pending).rejects.toThrow(MCPStateError);
      expect(transports[0]?.disconnectCalls).toBe(1);
      expect(registry.hasServer("calc")).toBe(false);
    });
  });

  describe("use", () => {
    it("should close the registry after the body", async () => {
      const names = await registry.use(async (r) => {
        await r.connectToServer("calc", stdio("calc-server"));
        return r.getServerNames();
      });

      expect(names).toEqual(["calc"]);
      expect(transports[0]?.isConnected()).toBe(false);
    });

    it("should close the registry when the body fails", async () => {
      await expect(
        registry.use(async (r) => {
          await r.connectToServer("calc", stdio("calc-server"));
          throw new Error("agent failed");
        }),
      ).rejects.toThrow("agent failed");

      expect(transports[0]?.isConnected()).toBe(false);
    });
  });
});
