/**
 * pg-geopoint - MCP Server Wrapper
 *
 * Exposes the company write path and schema bootstrap as MCP tools over
 * stdio. Domain errors come back as tool errors carrying their code.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { isGeoPointError } from '../types/index.js';
import type { ToolDefinition } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface ServerConfig {
    name: string;
    version: string;
    tools: ToolDefinition[];
}

function textResult(payload: unknown, isError = false): CallToolResult {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
        ...(isError ? { isError: true } : {})
    };
}

export class GeoPointMcpServer {
    private server: McpServer;
    private tools: Map<string, ToolDefinition>;
    private transport: StdioServerTransport | null = null;

    constructor(config: ServerConfig) {
        this.tools = new Map(config.tools.map(tool => [tool.name, tool]));
        this.server = new McpServer({
            name: config.name,
            version: config.version
        });

        logger.info('MCP Server initialized', {
            name: config.name,
            version: config.version,
            tools: this.tools.size
        });
    }

    private registerTools(): void {
        for (const tool of this.tools.values()) {
            this.server.registerTool(
                tool.name,
                {
                    description: tool.description,
                    inputSchema: tool.inputSchema.shape
                },
                async (args: unknown) => this.callTool(tool.name, args)
            );
        }
        logger.info('Tools registered', { tools: [...this.tools.keys()] });
    }

    /**
     * Run a tool by name and wrap its outcome as an MCP result
     */
    async callTool(name: string, args: unknown): Promise<CallToolResult> {
        const tool = this.tools.get(name);
        if (!tool) {
            return textResult({ error: 'UnknownTool', message: `Unknown tool: ${name}` }, true);
        }

        try {
            return textResult(await tool.handler(args));
        } catch (error) {
            if (isGeoPointError(error)) {
                logger.warn('Tool failed', { tool: name, code: error.code, message: error.message });
                return textResult(error.toJSON(), true);
            }
            if (error instanceof ZodError) {
                return textResult({
                    error: 'ValidationError',
                    issues: error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
                }, true);
            }
            logger.error('Tool crashed', {
                tool: name,
                error: error instanceof Error ? error.message : String(error)
            });
            return textResult({
                error: 'InternalError',
                message: error instanceof Error ? error.message : String(error)
            }, true);
        }
    }

    async start(): Promise<void> {
        this.registerTools();
        this.transport = new StdioServerTransport();
        await this.server.connect(this.transport);
        logger.info('MCP Server started with stdio transport');
    }

    async stop(): Promise<void> {
        logger.info('Stopping MCP Server...');

        try {
            await this.server.close();
            this.transport = null;
            logger.info('MCP Server stopped');
        } catch (error) {
            logger.error('Error stopping server', {
                error: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    }

    getToolNames(): string[] {
        return [...this.tools.keys()];
    }
}
