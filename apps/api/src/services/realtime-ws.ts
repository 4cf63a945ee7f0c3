import { randomUUID } from 'node:crypto'
import type { IncomingMessage } from 'node:http'
import type { Duplex } from 'node:stream'
import { WebSocketServer, WebSocket, type RawData } from 'ws'
import { idTagOf } from '@campus-voice/db'
import type { RealtimeServerEvent } from '@campus-voice/schema'
import { createLogger } from '../lib/logger.js'
import type { ComplaintStore } from './complaint-store.js'
import type { BroadcastRegistry, ClientInfo, RealtimeChannel } from './realtime-registry.js'

const logger = createLogger('realtime')

const FEED_PATH = /^\/api\/ws\/votes\/([^/]+)\/?$/

/** The parts of a `ws` socket a channel needs. */
export interface SocketLike {
  readonly readyState: number
  send(data: string, callback: (error?: Error) => void): void
  ping(): void
  close(code: number, reason: string): void
  terminate(): void
}

/**
 * RealtimeChannel over a `ws` socket. Liveness follows the ping/pong
 * heartbeat: a probe with no pong since the previous one terminates the
 * socket.
 */
export class WebSocketChannel implements RealtimeChannel {
  private alive = true

  constructor(
    private readonly socket: SocketLike,
    readonly id: string = randomUUID(),
  ) {}

  markAlive() {
    this.alive = true
  }

  send(event: RealtimeServerEvent) {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`Socket ${this.id} is not open`))
        return
      }
      this.socket.send(JSON.stringify(event), (error) => {
        if (error) reject(error)
        else resolve()
      })
    })
  }

  async probe() {
    if (this.socket.readyState !== WebSocket.OPEN) return false
    if (!this.alive) {
      this.socket.terminate()
      return false
    }
    this.alive = false
    this.socket.ping()
    return true
  }

  close(code: number, reason: string) {
    this.socket.close(code, reason)
  }
}

function rawDataToString(data: RawData) {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

/**
 * Reply for one client frame. Clients may send `ping` as plain text or as
 * `{"type":"ping"}`; anything else gets no reply.
 */
export function handleClientMessage(raw: string, now: () => Date = () => new Date()): RealtimeServerEvent | null {
  const text = raw.trim()
  if (text === 'ping') return { type: 'pong', timestamp: now().toISOString() }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return null
  }
  if (typeof parsed === 'object' && parsed !== null && 'type' in parsed && parsed.type === 'ping') {
    return { type: 'pong', timestamp: now().toISOString() }
  }
  return null
}

/** Complaint id addressed by an upgrade path, or `null` for other paths. */
export function parseFeedPath(pathname: string) {
  const match = FEED_PATH.exec(pathname)
  if (!match) return null
  try {
    return decodeURIComponent(match[1])
  } catch {
    return null
  }
}

function rejectUpgrade(socket: Duplex, status: '404 Not Found' | '503 Service Unavailable') {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`)
  socket.destroy()
}

function clientInfoFrom(req: IncomingMessage): ClientInfo {
  const info: ClientInfo = {}
  const userAgent = req.headers['user-agent']
  if (userAgent) info.user_agent = userAgent
  if (req.socket.remoteAddress) info.address = req.socket.remoteAddress
  return info
}

/**
 * Install the live vote feed on an HTTP server.
 *
 * Protocol:
 * - Connect to `/api/ws/votes/:complaintId`; unknown complaints get 404
 *   before the upgrade.
 * - The server sends `connection`, then `vote_update` / `status_update`.
 * - Send `ping` or `{"type":"ping"}` to get a `pong`.
 */
export function installVoteFeedServer(
  server: {
    on: (
      event: 'upgrade',
      listener: (req: IncomingMessage, socket: Duplex, head: Buffer) => void,
    ) => void
  },
  deps: { registry: BroadcastRegistry; store: Pick<ComplaintStore, 'getComplaint'> },
) {
  const wss = new WebSocketServer({ noServer: true })

  const accept = (ws: WebSocket, complaintId: string, req: IncomingMessage) => {
    const channel = new WebSocketChannel(ws)

    ws.on('pong', () => channel.markAlive())

    ws.on('message', (data: RawData) => {
      const reply = handleClientMessage(rawDataToString(data))
      if (!reply) {
        logger.debug(`Ignored client frame on ${complaintId}`)
        return
      }
      channel.send(reply).catch((error: unknown) => {
        logger.warn(`Pong to ${channel.id} failed: ${String(error)}`)
      })
    })

    ws.on('close', () => {
      deps.registry.unsubscribe(channel, complaintId).catch((error: unknown) => {
        logger.error(`Unsubscribe of ${channel.id} failed`, error)
      })
    })

    ws.on('error', (error: Error) => {
      logger.warn(`Socket ${channel.id} error: ${error.message}`)
    })

    deps.registry.subscribe(channel, complaintId, clientInfoFrom(req)).catch((error: unknown) => {
      logger.error(`Subscribe of ${channel.id} failed`, error)
    })
  }

  server.on('upgrade', (req, socket, head) => {
    const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`)
    const complaintId = parseFeedPath(url.pathname)
    if (complaintId === null) return
    if (idTagOf(complaintId) !== 'complaint') {
      rejectUpgrade(socket, '404 Not Found')
      return
    }

    deps.store
      .getComplaint(complaintId)
      .then((complaint) => {
        if (!complaint) {
          rejectUpgrade(socket, '404 Not Found')
          return
        }
        wss.handleUpgrade(req, socket, head, (ws: WebSocket) => accept(ws, complaintId, req))
      })
      .catch((error: unknown) => {
        logger.error(`Upgrade for ${complaintId} failed`, error)
        rejectUpgrade(socket, '503 Service Unavailable')
      })
  })

  return () => {
    wss.close()
  }
}
