/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import express, { type Express, type Request, type Response } from 'express'
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import type { ServerConfig } from './config.js'
import { errorMessage } from './errors.js'
import { createOpenSearchMcpServer, product, type ServerContext } from './server.js'

export interface RunningTransport {
  close: () => Promise<void>
}

type ListenerConfig = Pick<ServerConfig, 'host' | 'port' | 'path' | 'allowedHosts' | 'allowedOrigins'>

// DNS rebinding protection is only switched on when there is something to check against.
function rebindingOptions (config: ListenerConfig): {
  enableDnsRebindingProtection: boolean
  allowedHosts?: string[]
  allowedOrigins?: string[]
} {
  const enabled = config.allowedHosts.length > 0 || config.allowedOrigins.length > 0
  return {
    enableDnsRebindingProtection: enabled,
    allowedHosts: config.allowedHosts.length > 0 ? config.allowedHosts : undefined,
    allowedOrigins: config.allowedOrigins.length > 0 ? config.allowedOrigins : undefined
  }
}

function jsonRpcError (res: Response, status: number, code: number, message: string): void {
  if (res.headersSent) return
  res.status(status).json({ jsonrpc: '2.0', error: { code, message }, id: null })
}

async function listen (app: Express, config: ListenerConfig): Promise<RunningTransport> {
  return await new Promise((resolve, reject) => {
    const httpServer = app.listen(config.port, config.host, () => {
      resolve({
        close: async () => await new Promise<void>((resolveClose, rejectClose) => {
          httpServer.close((error) => (error != null ? rejectClose(error) : resolveClose()))
        })
      })
    })
    httpServer.once('error', reject)
  })
}

export async function runStdio (context: ServerContext): Promise<RunningTransport> {
  const server = createOpenSearchMcpServer(context)
  await server.connect(new StdioServerTransport())
  console.error(`${product.name} listening on stdio`)
  return { close: async () => await server.close() }
}

/**
 * Stateless streamable HTTP: every POST gets its own server and transport,
 * sharing the tool registry and cluster connections through `context`.
 */
export async function runStreamableHttp (context: ServerContext, config: ListenerConfig): Promise<RunningTransport> {
  const app = express()
  app.use(express.json())

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'streamable-http', tools: context.dispatcher.registry.size })
  })

  app.post(config.path, async (req: Request, res: Response) => {
    const server = createOpenSearchMcpServer(context)
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      ...rebindingOptions(config)
    })
    res.on('close', () => {
      transport.close().catch((error) => console.error(`Failed to close transport: ${errorMessage(error)}`))
      server.close().catch((error) => console.error(`Failed to close server: ${errorMessage(error)}`))
    })

    try {
      await server.connect(transport)
      await transport.handleRequest(req, res, req.body)
    } catch (error) {
      console.error(`Error handling MCP request: ${errorMessage(error)}`)
      jsonRpcError(res, 500, -32603, 'Internal server error')
    }
  })

  // Stateless mode keeps no sessions, so there is no stream to resume or end.
  const methodNotAllowed = (_req: Request, res: Response): void => {
    jsonRpcError(res, 405, -32000, 'Method not allowed.')
  }
  app.get(config.path, methodNotAllowed)
  app.delete(config.path, methodNotAllowed)

  const running = await listen(app, config)
  console.error(`${product.name} listening on http://${config.host}:${config.port}${config.path}`)
  return running
}

export async function runSse (context: ServerContext, config: ListenerConfig): Promise<RunningTransport> {
  const app = express()
  const transports = new Map<string, SSEServerTransport>()
  const messagesPath = '/messages'

  app.get(config.path, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(messagesPath, res, rebindingOptions(config))
    const server = createOpenSearchMcpServer(context)
    transports.set(transport.sessionId, transport)
    res.on('close', () => {
      transports.delete(transport.sessionId)
      server.close().catch((error) => console.error(`Failed to close server: ${errorMessage(error)}`))
    })

    try {
      await server.connect(transport)
    } catch (error) {
      console.error(`Error establishing SSE stream: ${errorMessage(error)}`)
      jsonRpcError(res, 500, -32603, 'Failed to establish SSE stream')
    }
  })

  app.post(messagesPath, express.json(), async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : undefined
    const transport = sessionId != null ? transports.get(sessionId) : undefined
    if (transport == null) {
      jsonRpcError(res, 400, -32000, 'Invalid or missing session ID')
      return
    }

    try {
      await transport.handlePostMessage(req, res, req.body)
    } catch (error) {
      console.error(`Error handling SSE message: ${errorMessage(error)}`)
      jsonRpcError(res, 500, -32603, 'Internal server error')
    }
  })

  const running = await listen(app, config)
  console.error(`${product.name} listening on http://${config.host}:${config.port}${config.path} (SSE)`)
  return {
    close: async () => {
      for (const transport of transports.values()) {
        await transport.close()
      }
      transports.clear()
      await running.close()
    }
  }
}

export async function runTransport (context: ServerContext, config: ServerConfig): Promise<RunningTransport> {
  switch (config.transport) {
    case 'stdio':
      return await runStdio(context)
    case 'http':
      return await runStreamableHttp(context, config)
    case 'sse':
      return await runSse(context, config)
  }
}
