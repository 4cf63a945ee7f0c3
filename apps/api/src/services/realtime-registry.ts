import type {
  RealtimeServerEvent,
  StatusUpdatePayload,
  VoteUpdatePayload,
} from '@campus-voice/schema'
import { errorMessage } from '../lib/errors.js'
import { KeyedMutex } from '../lib/keyed-mutex.js'
import { createLogger } from '../lib/logger.js'
import type { ComplaintEventBus } from './complaint-events.js'

const logger = createLogger('realtime')

/**
 * One open client connection. `send` rejects when the frame cannot be
 * delivered; `probe` resolves `false` once the peer stopped answering.
 */
export interface RealtimeChannel {
  readonly id: string
  send(event: RealtimeServerEvent): Promise<void>
  probe(): Promise<boolean>
  close(code: number, reason: string): void
}

export type ClientInfo = Record<string, string>

type Subscription = {
  channel: RealtimeChannel
  complaintId: string
  connectedAt: Date
  clientInfo: ClientInfo
}

export type BroadcastReport = {
  delivered: number
  dropped: number
}

export type SweepReport = {
  checked: number
  removed: number
}

export type RealtimeStats = {
  active_complaints: number
  total_active_connections: number
  total_connections_ever: number
  total_disconnections: number
  messages_delivered: number
  complaints_being_watched: string[]
  connections_per_complaint: Record<string, number>
  sweep_running: boolean
}

export type Watcher = {
  channel_id: string
  complaint_id: string
  connected_at: string
  client_info: ClientInfo
}

export const SHUTDOWN_CLOSE_CODE = 1000
export const SHUTDOWN_CLOSE_REASON = 'Server shutdown'
export const STALLED_CLOSE_CODE = 1001
export const STALLED_CLOSE_REASON = 'Peer stopped reading'
export const DEFAULT_SEND_TIMEOUT_MS = 5_000

export class ChannelTimeoutError extends Error {
  constructor(channelId: string, operation: string, timeoutMs: number) {
    super(`${operation} to ${channelId} timed out after ${timeoutMs}ms`)
    this.name = 'ChannelTimeoutError'
  }
}

/** Settles with `task`, or rejects with ChannelTimeoutError after `timeoutMs`. */
function withDeadline<T>(task: Promise<T>, timeoutMs: number, channelId: string, operation: string) {
  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new ChannelTimeoutError(channelId, operation, timeoutMs)), timeoutMs)
  })
  return Promise.race([task, deadline]).finally(() => clearTimeout(timer))
}

/**
 * Per-complaint subscriber sets for the live vote feed.
 *
 * Every read-modify-write of one complaint's set runs under that
 * complaint's lock, so a broadcast never sees a half-applied subscribe and
 * unrelated complaints never wait on each other. Sends and probes are bounded
 * by `sendTimeoutMs`; a channel that misses the bound is closed and dropped,
 * so one stalled peer holds its complaint's lock for at most that long.
 */
export class BroadcastRegistry {
  private readonly rooms = new Map<string, Map<string, Subscription>>()
  private readonly bindings = new Map<string, string>()
  private readonly locks = new KeyedMutex()
  private sweepTimer: NodeJS.Timeout | null = null
  private totalConnections = 0
  private totalDisconnections = 0
  private messagesDelivered = 0

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly sendTimeoutMs: number = DEFAULT_SEND_TIMEOUT_MS,
  ) {}

  /**
   * Binds `channel` to `complaintId`, moving it off any complaint it watched
   * before, and greets it with a `connection` event.
   */
  async subscribe(channel: RealtimeChannel, complaintId: string, clientInfo: ClientInfo = {}) {
    const previous = this.bindings.get(channel.id)
    if (previous !== undefined && previous !== complaintId) {
      await this.unsubscribe(channel, previous)
    }

    await this.locks.runExclusive(complaintId, async () => {
      let room = this.rooms.get(complaintId)
      if (!room) {
        room = new Map()
        this.rooms.set(complaintId, room)
      }
      if (!room.has(channel.id)) this.totalConnections += 1
      room.set(channel.id, { channel, complaintId, connectedAt: this.now(), clientInfo })
      this.bindings.set(channel.id, complaintId)

      logger.info(`Client connected to ${complaintId}. Active: ${room.size}`)

      try {
        await this.deliver(channel, {
          type: 'connection',
          complaint_id: complaintId,
          message: 'Connected to vote feed',
          timestamp: this.now().toISOString(),
        })
      } catch (error) {
        logger.warn(`Greeting failed for ${channel.id}: ${errorMessage(error)}`)
        this.drop(complaintId, channel, error)
      }
    })
  }

  /** Returns whether the channel was subscribed to `complaintId`. */
  async unsubscribe(channel: RealtimeChannel, complaintId: string) {
    return this.locks.runExclusive(complaintId, async () => {
      const removed = this.remove(complaintId, channel.id)
      if (removed) {
        logger.info(`Client disconnected from ${complaintId}. Remaining: ${this.connectionCount(complaintId)}`)
      }
      return removed
    })
  }

  broadcastVote(complaintId: string, payload: VoteUpdatePayload) {
    return this.broadcast(complaintId, {
      type: 'vote_update',
      complaint_id: complaintId,
      ...payload,
      timestamp: this.now().toISOString(),
    })
  }

  broadcastStatus(complaintId: string, payload: StatusUpdatePayload) {
    return this.broadcast(complaintId, {
      type: 'status_update',
      complaint_id: complaintId,
      ...payload,
      timestamp: this.now().toISOString(),
    })
  }

  /**
   * Probes every channel and drops the ones that fail. Complaints are swept
   * concurrently, each under its own lock.
   */
  async sweep(): Promise<SweepReport> {
    let checked = 0
    let removed = 0

    const sweeps = [...this.rooms.keys()].map((complaintId) =>
      this.locks.runExclusive(complaintId, async () => {
        const room = this.rooms.get(complaintId)
        if (!room) return
        const subscriptions = [...room.values()]
        const results = await Promise.allSettled(
          subscriptions.map((sub) => withDeadline(sub.channel.probe(), this.sendTimeoutMs, sub.channel.id, 'Probe')),
        )
        checked += subscriptions.length

        results.forEach((result, index) => {
          if (result.status === 'fulfilled' && result.value) return
          const { channel } = subscriptions[index]
          if (this.drop(complaintId, channel, result.status === 'rejected' ? result.reason : null)) removed += 1
        })
      }),
    )

    const outcomes = await Promise.allSettled(sweeps)
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') logger.error('Sweep of a complaint failed', outcome.reason)
    }

    if (removed > 0) logger.info(`Sweep removed ${removed} stale connection(s)`)
    return { checked, removed }
  }

  /** Runs `sweep` every `intervalMs` until `stopSweep` or `shutdown`. */
  startSweep(intervalMs: number) {
    this.stopSweep()
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logger.error('Sweep failed', error)
      })
    }, intervalMs)
    this.sweepTimer.unref()
  }

  stopSweep() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  /** Closes every channel and forgets all state. Returns how many were closed. */
  shutdown() {
    this.stopSweep()
    let closed = 0
    for (const room of this.rooms.values()) {
      for (const { channel } of room.values()) {
        try {
          channel.close(SHUTDOWN_CLOSE_CODE, SHUTDOWN_CLOSE_REASON)
        } catch (error) {
          logger.warn(`Closing ${channel.id} failed: ${errorMessage(error)}`)
        }
        closed += 1
        this.totalDisconnections += 1
      }
    }
    this.rooms.clear()
    this.bindings.clear()
    logger.info(`Closed ${closed} realtime connection(s)`)
    return closed
  }

  connectionCount(complaintId: string) {
    return this.rooms.get(complaintId)?.size ?? 0
  }

  getStats(): RealtimeStats {
    const perComplaint: Record<string, number> = {}
    let active = 0
    for (const [complaintId, room] of this.rooms) {
      perComplaint[complaintId] = room.size
      active += room.size
    }
    return {
      active_complaints: this.rooms.size,
      total_active_connections: active,
      total_connections_ever: this.totalConnections,
      total_disconnections: this.totalDisconnections,
      messages_delivered: this.messagesDelivered,
      complaints_being_watched: [...this.rooms.keys()],
      connections_per_complaint: perComplaint,
      sweep_running: this.sweepTimer !== null,
    }
  }

  getWatchers(complaintId: string): Watcher[] {
    const room = this.rooms.get(complaintId)
    if (!room) return []
    return [...room.values()].map((sub) => ({
      channel_id: sub.channel.id,
      complaint_id: sub.complaintId,
      connected_at: sub.connectedAt.toISOString(),
      client_info: { ...sub.clientInfo },
    }))
  }

  private async broadcast(complaintId: string, event: RealtimeServerEvent): Promise<BroadcastReport> {
    return this.locks.runExclusive(complaintId, async () => {
      const room = this.rooms.get(complaintId)
      if (!room || room.size === 0) return { delivered: 0, dropped: 0 }

      const subscriptions = [...room.values()]
      const results = await Promise.allSettled(subscriptions.map((sub) => this.deliver(sub.channel, event)))

      let delivered = 0
      let dropped = 0
      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          delivered += 1
          return
        }
        const { channel } = subscriptions[index]
        logger.warn(`Dropping ${channel.id} from ${complaintId}: ${errorMessage(result.reason)}`)
        if (this.drop(complaintId, channel, result.reason)) dropped += 1
      })

      this.messagesDelivered += delivered
      logger.debug(`${event.type} for ${complaintId}: ${delivered} delivered, ${dropped} dropped`)
      return { delivered, dropped }
    })
  }

  private deliver(channel: RealtimeChannel, event: RealtimeServerEvent) {
    return withDeadline(channel.send(event), this.sendTimeoutMs, channel.id, 'Send')
  }

  /** Removes a failed channel, closing it first when it stalled. Caller holds the complaint's lock. */
  private drop(complaintId: string, channel: RealtimeChannel, cause: unknown) {
    if (cause instanceof ChannelTimeoutError) {
      try {
        channel.close(STALLED_CLOSE_CODE, STALLED_CLOSE_REASON)
      } catch (error) {
        logger.warn(`Closing ${channel.id} failed: ${errorMessage(error)}`)
      }
    }
    return this.remove(complaintId, channel.id)
  }

  /** Caller holds the complaint's lock. */
  private remove(complaintId: string, channelId: string) {
    const room = this.rooms.get(complaintId)
    if (!room?.delete(channelId)) return false
    if (room.size === 0) this.rooms.delete(complaintId)
    if (this.bindings.get(channelId) === complaintId) this.bindings.delete(channelId)
    this.totalDisconnections += 1
    return true
  }
}

/**
 * Forwards committed complaint events to subscribers. Delivery runs in the
 * background; failures are logged and never reach the publisher.
 */
export function bridgeComplaintEvents(
  events: Pick<ComplaintEventBus, 'subscribe'>,
  registry: BroadcastRegistry,
) {
  return events.subscribe((event) => {
    const delivery =
      event.eventType === 'vote.changed'
        ? registry.broadcastVote(event.complaintId, event.payload)
        : registry.broadcastStatus(event.complaintId, event.payload)
    delivery.catch((error: unknown) => {
      logger.error(`Broadcast of ${event.eventType} for ${event.complaintId} failed`, error)
    })
  })
}
