/**
 * DPLL Server
 *
 * MCP server exposing the solver over stdio.
 * Tools: solve, check-satisfiable, evaluate, parse-instances.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { DpllException, serializeDpllError } from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';
import { SERVER_NAME, VERSION } from './version.js';

export { SERVER_NAME, VERSION };

type ToolHandler = (args: unknown, container: ServerContainer) => Promise<object> | object;

const toolHandlers: Record<string, ToolHandler> = {
    'solve': (args, c) => Handlers.solveHandler(args, c),
    'check-satisfiable': (args, c) => Handlers.checkSatisfiableHandler(args, c),
    'evaluate': (args) => Handlers.evaluateHandler(args),
    'parse-instances': (args) => Handlers.parseInstancesHandler(args),
};

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs ?? {};

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw new DpllException({
                    code: 'INVALID_ARGUMENTS',
                    message: `Unknown tool: ${name}`,
                    details: { available: Object.keys(toolHandlers) },
                });
            }

            const result = await handler(args, container);

            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        } catch (error) {
            // Handle structured DpllException
            if (error instanceof DpllException) {
                return {
                    content: [
                        {
                            type: 'text',
                            text: JSON.stringify(serializeDpllError(error.error), null, 2),
                        },
                    ],
                    isError: true,
                };
            }

            // stdout carries the protocol; diagnostics go to stderr
            console.error(`Tool ${name} failed:`, error);
            const errorMessage = error instanceof Error ? error.message : String(error);
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify({
                            error: errorMessage,
                            type: error instanceof Error ? error.constructor.name : 'Error',
                        }),
                    },
                ],
                isError: true,
            };
        }
    });

    return server;
}

/**
 * Run the MCP server until stdin closes
 */
export async function runServer(): Promise<void> {
    const container = createContainer();
    const server = createServer(container);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`${SERVER_NAME} ${VERSION} listening on stdio (engine: ${container.config.engine})`);
}
