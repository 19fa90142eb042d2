import { Server, Socket } from 'socket.io';
import type { Server as HttpServer } from 'http';
import logger from '../utils/logger';
import type { TrafficEvents } from './traffic/TrafficEvents';
import type {
  EntityRemovedEvent, SnapshotEntry, StateChangedEvent, TrafficState,
} from '../types/traffic.types';

export const SOCKET_EVENTS = {
  STATE_CHANGED: 'traffic:state_changed',
  SNAPSHOT: 'traffic:snapshot',
  REMOVED: 'traffic:removed',
} as const;

export interface StateChangedMessage {
  callsign: string;
  oldState: TrafficState;
  newState: TrafficState;
  latitude: number;
  longitude: number;
  altitudeFt: number;
  headingDeg: number;
  airspeedKt: number;
  voice: string;
  timestamp: string;
}

export interface SnapshotMessage {
  type: 'full';
  timestamp: string;
  data: SnapshotEntry[];
}

export const toStateChangedMessage = (event: StateChangedEvent): StateChangedMessage => ({
  callsign: event.id,
  oldState: event.oldState,
  newState: event.newState,
  latitude: event.telemetry.lat,
  longitude: event.telemetry.lon,
  altitudeFt: event.telemetry.altitudeFt,
  headingDeg: event.telemetry.headingDeg,
  airspeedKt: event.telemetry.airspeedKt,
  voice: event.voice,
  timestamp: new Date(event.occurredAt).toISOString(),
});

/**
 * Pushes traffic events to radar/chatter clients over Socket.IO
 */
export class RealtimeBroadcaster {
  private io: Server | null = null;

  private connectedClients = 0;

  private unsubscribers: Array<() => void> = [];

  constructor(private readonly events: TrafficEvents) {}

  initialize(server: HttpServer, allowedOrigins: string[]): Server {
    const io = new Server(server, {
      cors: {
        origin: allowedOrigins,
        methods: ['GET'],
      },
      transports: ['websocket', 'polling'],
    });
    this.attach(io);
    return io;
  }

  /**
   * Bind to an existing Socket.IO server and start forwarding traffic events.
   */
  attach(io: Server): void {
    this.detach();
    this.io = io;

    io.on('connection', (socket: Socket) => {
      this.connectedClients += 1;
      logger.info('Realtime client connected', {
        socketId: socket.id,
        totalClients: this.connectedClients,
      });

      socket.on('disconnect', (reason: string) => {
        this.connectedClients -= 1;
        logger.info('Realtime client disconnected', {
          socketId: socket.id,
          reason,
          totalClients: this.connectedClients,
        });
      });

      socket.emit('connected', {
        message: 'Connected to traffic updates',
        serverTime: new Date().toISOString(),
      });
    });

    this.unsubscribers = [
      this.events.on('stateChanged', (event) => this.broadcastStateChange(event)),
      this.events.on('snapshot', (entries) => this.broadcastSnapshot(entries)),
      this.events.on('entityRemoved', (event) => this.broadcastRemoval(event)),
    ];

    logger.info('Realtime broadcaster initialized');
  }

  detach(): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
  }

  broadcastStateChange(event: StateChangedEvent): void {
    if (!this.io) {
      return;
    }
    this.io.emit(SOCKET_EVENTS.STATE_CHANGED, toStateChangedMessage(event));
  }

  broadcastSnapshot(entries: SnapshotEntry[]): void {
    if (!this.io) {
      return;
    }
    const message: SnapshotMessage = {
      type: 'full',
      timestamp: new Date().toISOString(),
      data: entries,
    };
    this.io.emit(SOCKET_EVENTS.SNAPSHOT, message);
  }

  broadcastRemoval(event: EntityRemovedEvent): void {
    if (!this.io) {
      return;
    }
    this.io.emit(SOCKET_EVENTS.REMOVED, {
      callsign: event.id,
      lastState: event.lastState,
      lastSeen: new Date(event.lastSeen).toISOString(),
    });
  }

  getConnectedClientsCount(): number {
    return this.connectedClients;
  }

  async close(): Promise<void> {
    this.detach();
    if (this.io) {
      await new Promise<void>((resolve) => {
        this.io?.close(() => resolve());
      });
      this.io = null;
    }
    logger.info('Realtime broadcaster closed');
  }
}

export default RealtimeBroadcaster;
