import { randomUUID } from "node:crypto"
import type { Express, Request, Response } from "express"
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js"
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"

type Session = {
  server: McpServer
  transport: StreamableHTTPServerTransport
  connectPromise: Promise<void>
  sessionId?: string
  closed: boolean
}

export type CreateServer = () => McpServer

export type HttpTransportOptions = {
  /** When set, every request must carry `Authorization: Bearer <token>`. */
  token?: string
}

function respondWithError(res: Response, status: number, code: number, message: string) {
  res.status(status).json({
    jsonrpc: "2.0",
    error: { code, message },
    id: null
  })
}

function parseAuthorizationHeader(header: string | undefined) {
  const trimmed = header?.trim()
  if (!trimmed) {
    return undefined
  }
  const [scheme, ...rest] = trimmed.split(/\s+/)
  if (rest.length === 0 || scheme.toLowerCase() !== "bearer") {
    return undefined
  }
  return rest.join(" ").trim() || undefined
}

export function registerHttpTransport(app: Express, createServer: CreateServer, options: HttpTransportOptions = {}) {
  const sessions = new Map<string, Session>()

  function removeSession(session: Session) {
    if (session.sessionId && sessions.get(session.sessionId) === session) {
      sessions.delete(session.sessionId)
    }
  }

  function createSession() {
    const server = createServer()
    let session: Session
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        session.sessionId = sessionId
        sessions.set(sessionId, session)
      }
    })
    const connectPromise = server.connect(transport)
    session = { server, transport, connectPromise, closed: false }
    transport.onclose = () => {
      if (session.closed) {
        return
      }
      session.closed = true
      removeSession(session)
      server.close().catch((error: unknown) => {
        console.warn("Failed to close MCP session:", error)
      })
    }
    return session
  }

  function isAuthorised(req: Request, res: Response) {
    if (!options.token) {
      return true
    }
    const token = parseAuthorizationHeader(req.header("authorization"))
    if (token !== options.token) {
      respondWithError(res, 401, -32002, "Provide a valid Bearer token in the Authorization header")
      return false
    }
    return true
  }

  function resolveSession(req: Request, res: Response) {
    const header = req.headers["mcp-session-id"]
    const sessionId = Array.isArray(header) ? header[header.length - 1] : header
    if (sessionId) {
      const existing = sessions.get(sessionId)
      if (!existing) {
        respondWithError(res, 404, -32001, "Session not found")
        return undefined
      }
      return existing
    }
    if (req.method !== "POST") {
      respondWithError(res, 400, -32000, "Mcp-Session-Id header is required")
      return undefined
    }
    return createSession()
  }

  app.all("/mcp", async (req: Request, res: Response) => {
    if (!isAuthorised(req, res)) {
      return
    }
    const session = resolveSession(req, res)
    if (!session) {
      return
    }

    try {
      await session.connectPromise
      await session.transport.handleRequest(req, res, req.body)
    } catch (error) {
      console.error("MCP request failed:", error)
      if (!res.headersSent) {
        res.status(500).json({ error: error instanceof Error ? error.message : "Unknown error" })
      }
      session.transport.close().catch((closeError: unknown) => {
        console.warn("Failed to close MCP transport:", closeError)
      })
    }
  })
}
