/**
 * MCP Tool Binding
 *
 * Binds a server's tool descriptors to the session that serves them, so
 * agent frameworks can treat them as named, schema-described invocables.
 */

import { z } from "zod";
import type {
  JSONObject,
  MCPCallToolResult,
  MCPClient,
  MCPRequestOptions,
  MCPTool,
  MCPToolInputSchema,
} from "./types.js";
import { MCPDataError, MCPToolExecutionError } from "./errors.js";
import { JSONObjectSchema } from "./protocol.js";

/**
 * A tool bound to the server that provides it
 */
export interface MCPBoundTool {
  /** Name as advertised by the server */
  readonly name: string;
  readonly description: string;
  readonly inputSchema: MCPToolInputSchema;
  readonly serverName: string;
  /** `<server>_<tool>` restricted to [A-Za-z0-9_] */
  readonly qualifiedName: string;
  /** zod schema derived from `inputSchema` */
  readonly parameters: z.ZodTypeAny;
  /** Call the tool with raw arguments */
  invoke(args?: JSONObject, options?: MCPRequestOptions): Promise<MCPCallToolResult>;
  /** Validate `args` against `parameters`, call the tool and flatten the result to text */
  execute(args: unknown, options?: MCPRequestOptions): Promise<string>;
}

type JSONSchema = Record<string, unknown>;
type Literal = string | number | boolean | null;

function isSchema(value: unknown): value is JSONSchema {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLiteral(value: unknown): value is Literal {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function schemaList(value: unknown): JSONSchema[] {
  return Array.isArray(value) ? value.filter(isSchema) : [];
}

function numberField(schema: JSONSchema, key: string): number | undefined {
  const value = schema[key];
  return typeof value === "number" ? value : undefined;
}

function unionOf(schemas: z.ZodTypeAny[]): z.ZodTypeAny {
  const [first, second, ...rest] = schemas;
  if (!first) return z.unknown();
  if (!second) return first;
  return z.union([first, second, ...rest]);
}

function enumOf(values: unknown[]): z.ZodTypeAny {
  const strings = values.filter((v): v is string => typeof v === "string");
  const [head, ...tail] = strings;
  if (head !== undefined && strings.length === values.length) {
    return z.enum([head, ...tail]);
  }
  return unionOf(values.filter(isLiteral).map((v) => z.literal(v)));
}

function stringSchema(schema: JSONSchema): z.ZodTypeAny {
  let s = z.string();
  switch (schema.format) {
    case "uri":
    case "url":
      s = s.url();
      break;
    case "email":
      s = s.email();
      break;
    case "date-time":
    case "datetime":
      s = s.datetime();
      break;
  }
  const minLength = numberField(schema, "minLength");
  const maxLength = numberField(schema, "maxLength");
  if (minLength !== undefined) s = s.min(minLength);
  if (maxLength !== undefined) s = s.max(maxLength);
  return s;
}

function numberSchema(schema: JSONSchema, integer: boolean): z.ZodTypeAny {
  let n = integer ? z.number().int() : z.number();
  const minimum = numberField(schema, "minimum");
  const maximum = numberField(schema, "maximum");
  const exclusiveMinimum = numberField(schema, "exclusiveMinimum");
  const exclusiveMaximum = numberField(schema, "exclusiveMaximum");
  if (minimum !== undefined) n = n.min(minimum);
  if (maximum !== undefined) n = n.max(maximum);
  if (exclusiveMinimum !== undefined) n = n.gt(exclusiveMinimum);
  if (exclusiveMaximum !== undefined) n = n.lt(exclusiveMaximum);
  return n;
}

function objectSchema(schema: JSONSchema): z.ZodTypeAny {
  const properties = schema.properties;
  if (!isSchema(properties)) {
    return z.record(z.string(), z.unknown());
  }

  const required = Array.isArray(schema.required) ? schema.required : [];
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, propSchema] of Object.entries(properties)) {
    if (!isSchema(propSchema)) continue;

    let field = jsonSchemaToZod(propSchema);
    if (!required.includes(key)) field = field.optional();
    if (typeof propSchema.description === "string") field = field.describe(propSchema.description);
    shape[key] = field;
  }

  return schema.additionalProperties === false ? z.object(shape).strict() : z.object(shape).passthrough();
}

function typedSchema(schema: JSONSchema, type: unknown): z.ZodTypeAny {
  switch (type) {
    case "string":
      return stringSchema(schema);
    case "number":
      return numberSchema(schema, false);
    case "integer":
      return numberSchema(schema, true);
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "array": {
      let arr = z.array(isSchema(schema.items) ? jsonSchemaToZod(schema.items) : z.unknown());
      const minItems = numberField(schema, "minItems");
      const maxItems = numberField(schema, "maxItems");
      if (minItems !== undefined) arr = arr.min(minItems);
      if (maxItems !== undefined) arr = arr.max(maxItems);
      return arr;
    }
    case "object":
      return objectSchema(schema);
    default:
      return z.unknown();
  }
}

/**
 * Convert a JSON schema to a zod schema.
 * Supports enum, const, oneOf, anyOf, allOf, nullable and type arrays,
 * string formats (uri, email, date-time) and numeric bounds.
 */
export function jsonSchemaToZod(schema: JSONSchema): z.ZodTypeAny {
  if (Array.isArray(schema.enum)) {
    return enumOf(schema.enum);
  }

  if (isLiteral(schema.const)) {
    return z.literal(schema.const);
  }

  const alternatives = schemaList(schema.oneOf ?? schema.anyOf);
  if (alternatives.length > 0) {
    return unionOf(alternatives.map(jsonSchemaToZod));
  }

  const [first, ...rest] = schemaList(schema.allOf).map(jsonSchemaToZod);
  if (first) {
    return rest.reduce<z.ZodTypeAny>((acc, s) => z.intersection(acc, s), first);
  }

  if (Array.isArray(schema.type)) {
    const types = schema.type.filter((t): t is string => typeof t === "string");
    const nonNull = types.filter((t) => t !== "null");
    const base = unionOf(nonNull.map((t) => typedSchema(schema, t)));
    return types.includes("null") ? base.nullable() : base;
  }

  const base = typedSchema(schema, schema.type);
  return schema.nullable === true ? base.nullable() : base;
}

/**
 * Flatten a tool result to text. A result flagged `isError` raises.
 */
export function formatToolResult(result: MCPCallToolResult, toolName = "tool"): string {
  if (result.isError) {
    const detail = result.content
      .map((c) => c.text ?? "")
      .filter(Boolean)
      .join("\n");
    throw new MCPToolExecutionError(toolName, detail || `Tool '${toolName}' reported an error`);
  }

  const text = result.content
    .map((item) => {
      switch (item.type) {
        case "text":
          return item.text ?? "";
        case "image":
          return `[Image: ${item.mimeType ?? "unknown"}]`;
        case "audio":
          return `[Audio: ${item.mimeType ?? "unknown"}]`;
        case "resource":
          return item.resource?.text ?? `[Resource: ${item.resource?.uri ?? "unknown"}]`;
        default:
          return "";
      }
    })
    .filter(Boolean)
    .join("\n");

  if (!text && result.structuredContent !== undefined) {
    return JSON.stringify(result.structuredContent);
  }
  return text;
}

/**
 * Build the qualified name `<server>_<tool>`
 */
export function createToolName(serverName: string, toolName: string): string {
  return `${serverName}_${toolName}`.replace(/[^a-zA-Z0-9_]/g, "_");
}

/**
 * Bind one tool descriptor to the client that serves it
 */
export function bindTool(
  tool: MCPTool,
  serverName: string,
  client: Pick<MCPClient, "callTool">,
): MCPBoundTool {
  const parameters = jsonSchemaToZod(tool.inputSchema);

  const invoke = (args: JSONObject = {}, options?: MCPRequestOptions): Promise<MCPCallToolResult> =>
    client.callTool(tool.name, args, options);

  return {
    name: tool.name,
    description: tool.description ?? `MCP tool: ${tool.name}`,
    inputSchema: tool.inputSchema,
    serverName,
    qualifiedName: createToolName(serverName, tool.name),
    parameters,
    invoke,
    async execute(args: unknown, options?: MCPRequestOptions): Promise<string> {
      const checked = parameters.safeParse(args ?? {});
      if (!checked.success) {
        throw new MCPDataError(
          `Invalid arguments for tool '${tool.name}'`,
          checked.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
        );
      }
      const json = JSONObjectSchema.safeParse(checked.data);
      if (!json.success) {
        throw new MCPDataError(`Arguments for tool '${tool.name}' must be a JSON object`);
      }
      return formatToolResult(await invoke(json.data, options), tool.name);
    },
  };
}

/**
 * Bind every tool of one server
 */
export function bindTools(
  tools: MCPTool[],
  serverName: string,
  client: Pick<MCPClient, "callTool">,
): MCPBoundTool[] {
  return tools.map((tool) => bindTool(tool, serverName, client));
}
