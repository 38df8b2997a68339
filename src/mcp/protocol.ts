/**
 * Wire validation for JSON-RPC messages and MCP result payloads
 */

import { z } from "zod";
import { MCPDataError } from "./errors.js";
import type {
  JSONObject,
  JSONRPCMessage,
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponse,
  JSONValue,
  MCPResourceContent,
} from "./types.js";

export const PROTOCOL_VERSION = "2024-11-05";

export const JSONValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JSONValueSchema),
    z.record(JSONValueSchema),
  ]),
);

export const JSONObjectSchema: z.ZodType<JSONObject> = z.record(JSONValueSchema);

const IdSchema = z.union([z.string(), z.number()]);

const ResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: IdSchema.nullable(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const RequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: IdSchema,
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

const NotificationSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

export function isResponse(message: JSONRPCMessage): message is JSONRPCResponse {
  return !("method" in message);
}

export function isRequest(message: JSONRPCMessage): message is JSONRPCRequest {
  return "method" in message && "id" in message;
}

export function isNotification(message: JSONRPCMessage): message is JSONRPCNotification {
  return "method" in message && !("id" in message);
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a decoded JSON value as a JSON-RPC 2.0 message
 */
export function parseJSONRPCMessage(value: unknown): JSONRPCMessage {
  if (typeof value === "object" && value !== null && "method" in value) {
    const schema = "id" in value ? RequestSchema : NotificationSchema;
    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;
    throw new MCPDataError("Invalid JSON-RPC message", describeIssues(parsed.error));
  }

  const parsed = ResponseSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  throw new MCPDataError("Invalid JSON-RPC message", describeIssues(parsed.error));
}

/**
 * Decode one line or event of JSON text into a JSON-RPC message
 */
export function decodeJSONRPCMessage(text: string): JSONRPCMessage {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new MCPDataError(`Failed to parse message: ${text.slice(0, 200)}`, [], { cause: error });
  }
  return parseJSONRPCMessage(value);
}

/**
 * Validate the result of `method` against its schema
 */
export function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  method: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new MCPDataError(`Malformed '${method}' response`, describeIssues(parsed.error));
  }
  return parsed.data;
}

// Result payloads

const CursorSchema = z.string().optional();

export const ImplementationInfoSchema = z
  .object({
    name: z.string(),
    version: z.string(),
  })
  .passthrough();

const ListChangedSchema = z.object({ listChanged: z.boolean().optional() }).passthrough();

export const ServerCapabilitiesSchema = z
  .object({
    tools: ListChangedSchema.optional(),
    resources: z
      .object({
        subscribe: z.boolean().optional(),
        listChanged: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    prompts: ListChangedSchema.optional(),
    logging: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: ServerCapabilitiesSchema,
  serverInfo: ImplementationInfoSchema,
  instructions: z.string().optional(),
});

export const EmptyResultSchema = z.record(z.unknown());

const ToolSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z
    .object({
      type: z.literal("object"),
      properties: z.record(z.unknown()).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
});

export const ToolsPageSchema = z.object({
  tools: z.array(ToolSchema),
  nextCursor: CursorSchema,
});

const ContentItemSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
    data: z.string().optional(),
    mimeType: z.string().optional(),
    resource: z
      .object({
        uri: z.string(),
        mimeType: z.string().optional(),
        text: z.string().optional(),
        blob: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

export const CallToolResultSchema = z.object({
  content: z.array(ContentItemSchema).default([]),
  structuredContent: JSONObjectSchema.optional(),
  isError: z.boolean().optional(),
});

const PromptSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  arguments: z
    .array(
      z.object({
        name: z.string(),
        description: z.string().optional(),
        required: z.boolean().optional(),
      }),
    )
    .optional(),
});

export const PromptsPageSchema = z.object({
  prompts: z.array(PromptSchema),
  nextCursor: CursorSchema,
});

export const GetPromptResultSchema = z.object({
  description: z.string().optional(),
  messages: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      content: ContentItemSchema,
    }),
  ),
});

const ResourceSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const ResourcesPageSchema = z.object({
  resources: z.array(ResourceSchema),
  nextCursor: CursorSchema,
});

const ResourceTemplateSchema = z.object({
  uriTemplate: z.string(),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const ResourceTemplatesPageSchema = z.object({
  resourceTemplates: z.array(ResourceTemplateSchema),
  nextCursor: CursorSchema,
});

const ResourceContentSchema = z
  .object({
    uri: z.string(),
    mimeType: z.string().optional(),
    text: z.string().optional(),
    blob: z.string().optional(),
  })
  .transform((item, ctx): MCPResourceContent => {
    const { uri, mimeType, text, blob } = item;
    if (text !== undefined && blob === undefined) {
      return mimeType === undefined ? { uri, text } : { uri, mimeType, text };
    }
    if (blob !== undefined && text === undefined) {
      return mimeType === undefined ? { uri, blob } : { uri, mimeType, blob };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "resource content must carry exactly one of text or blob",
    });
    return z.NEVER;
  });

export const ReadResourceResultSchema = z.object({
  contents: z.array(ResourceContentSchema),
});

export const ResourceUpdatedParamsSchema = z.object({
  uri: z.string(),
});
