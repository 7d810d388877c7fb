#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { loadCodecConfig } from "./config.js";
import { decodeToonTool, encodeJsonTool } from "./tools.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

const config = loadCodecConfig();

// --- MCP server ---

const server = new McpServer({
  name: "toon-codec",
  version: "0.1.0",
});

server.registerTool(
  "toon_encode",
  {
    description:
      "Convert JSON to TOON, a compact indentation-based notation. Uniform arrays of objects become tables with one header and one comma-separated row per item.",
    inputSchema: z.object({
      json: z.string().describe("The JSON document to convert"),
      indent: z.number().int().min(1).max(16).optional().describe("Spaces per nesting level (default from TOON_INDENT, 2)"),
    }),
  },
  async (args) => encodeJsonTool(args, config),
);

server.registerTool(
  "toon_decode",
  {
    description:
      "Convert TOON text back to JSON. Declared array lengths and table column types are checked; errors report the line.",
    inputSchema: z.object({
      toon: z.string().describe("The TOON document to convert"),
    }),
  },
  async (args) => decodeToonTool(args, config),
);

// ============================================================
// START SERVER
// ============================================================

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `toon-codec MCP server running on stdio (indent ${config.indent}, max depth ${config.maxDepth}, ` +
      `max inline ${config.maxInlineLength ?? "unlimited"})`,
  );
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
