/**
 * MCP tool implementations for AnnoStore
 * Every tool returns a one-line text summary followed by the JSON result as text
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import {
  AddAnnotationInputSchema,
  CreateContainerInputSchema,
  CreateSearchInputSchema,
  GetAnnotationInputSchema,
  GetContainerInputSchema,
  GetSearchInfoInputSchema,
  GetSearchPageInputSchema,
  GlobalSearchPageInputSchema,
  GlobalSearchStatusInputSchema,
  IndexInputSchema,
  ListIndexesInputSchema,
  StartGlobalSearchInputSchema,
} from "./schemas.js";
import { mapErrorToMcp, ToolTimeoutError } from "./errors.js";
import type { AnnoStoreService } from "./service/annostore.js";
import { logger } from "./observability/logger.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
};

export type ToolHandler = (args: unknown) => Promise<ToolResult>;

export const TOOL_NAMES = [
  "create_container",
  "get_container",
  "add_annotation",
  "get_annotation",
  "create_search",
  "get_search_page",
  "get_search_info",
  "add_index",
  "get_index_status",
  "list_indexes",
  "delete_index",
  "start_global_search",
  "get_global_search_status",
  "get_global_search_page",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Tools that change nothing in storage
 */
export const READ_ONLY_TOOLS: ReadonlySet<ToolName> = new Set<ToolName>([
  "get_container",
  "get_annotation",
  "create_search",
  "get_search_page",
  "get_search_info",
  "get_index_status",
  "list_indexes",
  "start_global_search",
  "get_global_search_status",
  "get_global_search_page",
]);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

function result(summary: string, json: unknown): ToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(json, null, 2) },
    ],
  };
}

// Helper to wrap tool execution with timeout and logging
async function executeTool<T>(
  toolName: ToolName,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(timeoutMs)), timeoutMs);
    });

    const value = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return value;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    logger.toolCall(toolName, Date.now() - startTime, success, error);
  }
}

/**
 * Build the tool handlers for one service (one caller identity)
 */
export function createToolHandlers(service: AnnoStoreService): Record<ToolName, ToolHandler> {
  return {
    create_container: async (args) => {
      const request = CreateContainerInputSchema.parse(args);
      return executeTool("create_container", 5000, async () => {
        const container = await service.createContainer(request);
        return result(`Created container ${container.name}`, container);
      });
    },

    get_container: async (args) => {
      const { container } = GetContainerInputSchema.parse(args);
      return executeTool("get_container", 2000, async () => {
        const info = await service.getContainer(container);
        return result(`Container ${info.name} holds ${info.annotationCount} annotations`, info);
      });
    },

    add_annotation: async (args) => {
      const { container, annotation, name } = AddAnnotationInputSchema.parse(args);
      return executeTool("add_annotation", 5000, async () => {
        const added = await service.addAnnotation(container, annotation, name);
        return result(`Stored annotation ${container}/${added.annotationName}`, added);
      });
    },

    get_annotation: async (args) => {
      const { container, name } = GetAnnotationInputSchema.parse(args);
      return executeTool("get_annotation", 2000, async () => {
        const record = await service.getAnnotation(container, name);
        return result(`Found annotation ${container}/${name}`, record);
      });
    },

    create_search: async (args) => {
      const { container, query } = CreateSearchInputSchema.parse(args);
      return executeTool("create_search", 10_000, async () => {
        const search = await service.createSearch(container, query);
        return result(`Search ${search.id} found ${search.totalHits} annotations`, search);
      });
    },

    get_search_page: async (args) => {
      const { container, searchId, page } = GetSearchPageInputSchema.parse(args);
      return executeTool("get_search_page", 10_000, async () => {
        const annotationPage = await service.getSearchPage(container, searchId, page);
        return result(
          `Page ${page} of search ${searchId} holds ${annotationPage.items.length} annotations`,
          annotationPage
        );
      });
    },

    get_search_info: async (args) => {
      const { container, searchId } = GetSearchInfoInputSchema.parse(args);
      return executeTool("get_search_info", 2000, async () => {
        const info = await service.getSearchInfo(container, searchId);
        return result(`Search ${searchId} found ${info.totalHits} annotations`, info);
      });
    },

    add_index: async (args) => {
      const { container, field, type } = IndexInputSchema.parse(args);
      return executeTool("add_index", 5000, async () => {
        const chore = await service.addIndex(container, field, type);
        return result(`Index build ${chore.id} on ${container}.${field} is ${chore.state}`, chore);
      });
    },

    get_index_status: async (args) => {
      const { container, field, type } = IndexInputSchema.parse(args);
      return executeTool("get_index_status", 2000, async () => {
        const chore = await service.getIndexStatus(container, field, type);
        return result(`Index build ${chore.id} on ${container}.${field} is ${chore.state}`, chore);
      });
    },

    list_indexes: async (args) => {
      const { container } = ListIndexesInputSchema.parse(args);
      return executeTool("list_indexes", 2000, async () => {
        const indexes = await service.listIndexes(container);
        return result(`Found ${indexes.length} indexes in ${container}`, { indexes, count: indexes.length });
      });
    },

    delete_index: async (args) => {
      const { container, field, type } = IndexInputSchema.parse(args);
      return executeTool("delete_index", 5000, async () => {
        await service.deleteIndex(container, field, type);
        return result(`Deleted ${type} index on ${container}.${field}`, { ok: true });
      });
    },

    start_global_search: async (args) => {
      const { query } = StartGlobalSearchInputSchema.parse(args);
      return executeTool("start_global_search", 5000, async () => {
        const task = await service.startGlobalSearch(query);
        return result(
          `Global search ${task.id} started over ${task.containersToSearch.length} containers`,
          task
        );
      });
    },

    get_global_search_status: async (args) => {
      const { searchId } = GlobalSearchStatusInputSchema.parse(args);
      return executeTool("get_global_search_status", 2000, async () => {
        const task = await service.getGlobalSearchStatus(searchId);
        return result(`Global search ${task.id} is ${task.state} with ${task.resultCount} hits`, task);
      });
    },

    get_global_search_page: async (args) => {
      const { searchId, page } = GlobalSearchPageInputSchema.parse(args);
      return executeTool("get_global_search_page", 10_000, async () => {
        const annotationPage = await service.getGlobalSearchPage(searchId, page);
        return result(
          `Page ${page} of global search ${searchId} holds ${annotationPage.items.length} annotations`,
          annotationPage
        );
      });
    },
  };
}

/**
 * Dispatch one tool call, enforcing read-only mode and mapping failures to MCP errors
 */
export async function callTool(
  handlers: Record<ToolName, ToolHandler>,
  name: string,
  args: unknown,
  options: { readOnly: boolean }
): Promise<ToolResult> {
  try {
    if (!isToolName(name)) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
    if (options.readOnly && !READ_ONLY_TOOLS.has(name)) {
      throw new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`);
    }
    return await handlers[name](args);
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }

    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("server.tool.error", {
      tool: name,
      err_message: err.message,
      stack: err.stack,
    });

    const { code, message } = mapErrorToMcp(error);
    throw new McpError(code, message);
  }
}

const containerProperty = {
  type: "string",
  description: "Annotation container name",
};

const indexProperties = {
  container: containerProperty,
  field: {
    type: "string",
    description: "Dotted field path inside the annotation (e.g., 'body.type')",
  },
  type: {
    type: "string",
    enum: ["hashed", "ascending", "descending", "text"],
    description: "Index type",
  },
};

const queryProperty = {
  type: "object",
  description:
    "Query object: field paths with literal values or operators (':isEqualTo', ':isNotEqualTo', ':isIn', ':isNotIn', ':isGreater', ':isGreaterOrEqual', ':isLess', ':isLessOrEqual'), or the query functions ':overlapsWithTextAnchorRange' and ':isWithinTextAnchorRange'",
};

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Array<{
  name: ToolName;
  description: string;
  inputSchema: { type: "object"; properties: Record<string, unknown>; required?: string[] };
}> = [
  {
    name: "create_container",
    description: "Create an annotation container; a taken or missing name gets a generated one",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Preferred container name" },
        label: { type: "string", description: "Human-readable label (defaults to the name)" },
        readOnlyForAnonymousUsers: {
          type: "boolean",
          description: "Let unauthenticated callers search and read",
        },
      },
    },
  },
  {
    name: "get_container",
    description: "Describe a container: label, timestamps and annotation count",
    inputSchema: {
      type: "object",
      properties: { container: containerProperty },
      required: ["container"],
    },
  },
  {
    name: "add_annotation",
    description: "Store a W3C annotation in a container",
    inputSchema: {
      type: "object",
      properties: {
        container: containerProperty,
        annotation: { type: "object", description: "Annotation content (JSON object)" },
        name: { type: "string", description: "Preferred annotation name" },
      },
      required: ["container", "annotation"],
    },
  },
  {
    name: "get_annotation",
    description: "Retrieve an annotation with its etag and timestamps",
    inputSchema: {
      type: "object",
      properties: {
        container: containerProperty,
        name: { type: "string", description: "Annotation name" },
      },
      required: ["container", "name"],
    },
  },
  {
    name: "create_search",
    description: "Run a query against a container and cache the result for paging",
    inputSchema: {
      type: "object",
      properties: { container: containerProperty, query: queryProperty },
      required: ["container", "query"],
    },
  },
  {
    name: "get_search_page",
    description: "Fetch one page of a cached search as a W3C AnnotationPage",
    inputSchema: {
      type: "object",
      properties: {
        container: containerProperty,
        searchId: { type: "string", description: "Search id returned by create_search" },
        page: { type: "number", description: "Zero-based page number (default 0)" },
      },
      required: ["container", "searchId"],
    },
  },
  {
    name: "get_search_info",
    description: "Show the query and total hit count of a cached search",
    inputSchema: {
      type: "object",
      properties: {
        container: containerProperty,
        searchId: { type: "string", description: "Search id returned by create_search" },
      },
      required: ["container", "searchId"],
    },
  },
  {
    name: "add_index",
    description: "Start building an index in the background (idempotent while a build is live)",
    inputSchema: {
      type: "object",
      properties: indexProperties,
      required: ["container", "field", "type"],
    },
  },
  {
    name: "get_index_status",
    description: "Report the state of an index build",
    inputSchema: {
      type: "object",
      properties: indexProperties,
      required: ["container", "field", "type"],
    },
  },
  {
    name: "list_indexes",
    description: "List the annotation indexes of a container",
    inputSchema: {
      type: "object",
      properties: { container: containerProperty },
      required: ["container"],
    },
  },
  {
    name: "delete_index",
    description: "Drop an index",
    inputSchema: {
      type: "object",
      properties: indexProperties,
      required: ["container", "field", "type"],
    },
  },
  {
    name: "start_global_search",
    description: "Search every container the caller can read, in the background",
    inputSchema: {
      type: "object",
      properties: { query: queryProperty },
      required: ["query"],
    },
  },
  {
    name: "get_global_search_status",
    description: "Report the progress of a global search",
    inputSchema: {
      type: "object",
      properties: {
        searchId: { type: "string", description: "Id returned by start_global_search" },
      },
      required: ["searchId"],
    },
  },
  {
    name: "get_global_search_page",
    description: "Fetch one page of a global search's hits",
    inputSchema: {
      type: "object",
      properties: {
        searchId: { type: "string", description: "Id returned by start_global_search" },
        page: { type: "number", description: "Zero-based page number (default 0)" },
      },
      required: ["searchId"],
    },
  },
];

export function listTools(readOnly: boolean): typeof toolDefinitions {
  return readOnly ? toolDefinitions.filter((t) => READ_ONLY_TOOLS.has(t.name)) : toolDefinitions;
}
