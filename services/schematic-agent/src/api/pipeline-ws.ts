/**
 * Pipeline WebSocket Namespace
 *
 * Streams pipeline progress to browser clients on the `/pipeline` namespace
 * and keeps per-run state (status, capped event history, output paths) for
 * reconnect replay and the REST status endpoint.
 */

import { Server as SocketIOServer, Namespace, Socket } from 'socket.io';
import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { createProgressEvent, PipelineEventType, PipelineProgressEvent } from '../pipeline/progress.js';
import { log, Logger } from '../utils/logger.js';

const wsLogger: Logger = log.child({ service: 'pipeline-ws' });

export const PIPELINE_NAMESPACE = '/pipeline';
const MAX_EVENT_HISTORY = 50;
const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export type OperationStatus = 'running' | 'complete' | 'error';

/**
 * Tracking for one pipeline run
 */
export interface PipelineOperation {
  operationId: string;
  circuitName: string;
  startedAt: Date;
  status: OperationStatus;
  lastEvent?: PipelineProgressEvent;
  eventCount: number;
  completedPhases: string[];
  eventHistory: PipelineProgressEvent[];
  schematicPath?: string;
  reportPath?: string;
  accepted?: boolean;
  errorMessage?: string;
}

export interface OperationStateMessage {
  operationId: string;
  circuitName: string;
  status: OperationStatus;
  completedPhases: string[];
  eventHistory: PipelineProgressEvent[];
  lastEvent?: PipelineProgressEvent;
  eventCount: number;
  startedAt: string;
  accepted?: boolean;
  errorMessage?: string;
}

export interface PipelineWebSocketOptions {
  /** How long finished runs stay queryable */
  retentionMs?: number;
}

export function toStateMessage(operation: PipelineOperation): OperationStateMessage {
  return {
    operationId: operation.operationId,
    circuitName: operation.circuitName,
    status: operation.status,
    completedPhases: operation.completedPhases,
    eventHistory: operation.eventHistory,
    lastEvent: operation.lastEvent,
    eventCount: operation.eventCount,
    startedAt: operation.startedAt.toISOString(),
    accepted: operation.accepted,
    errorMessage: operation.errorMessage,
  };
}

export class PipelineWebSocketManager extends EventEmitter {
  private namespace: Namespace;
  private operations: Map<string, PipelineOperation> = new Map();
  private cleanupTimers: Map<string, NodeJS.Timeout> = new Map();
  private readonly retentionMs: number;

  constructor(io: SocketIOServer, options: PipelineWebSocketOptions = {}) {
    super();
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.namespace = io.of(PIPELINE_NAMESPACE);
    this.setupNamespace();
    wsLogger.info('PipelineWebSocketManager initialized');
  }

  private setupNamespace(): void {
    this.namespace.on('connection', (socket: Socket) => {
      wsLogger.debug('Client connected to /pipeline namespace', { socketId: socket.id });

      socket.on('subscribe:operation', (operationId: unknown) => {
        if (typeof operationId !== 'string') return;
        void socket.join(`operation:${operationId}`);

        // Full state so a late or reconnecting client can catch up
        const operation = this.operations.get(operationId);
        if (operation) {
          socket.emit('operation:state', toStateMessage(operation));
        }
      });

      socket.on('unsubscribe:operation', (operationId: unknown) => {
        if (typeof operationId !== 'string') return;
        void socket.leave(`operation:${operationId}`);
      });

      socket.on('heartbeat', () => {
        socket.emit('heartbeat:ack', { timestamp: new Date().toISOString() });
      });

      socket.on('disconnect', () => {
        wsLogger.debug('Client disconnected from /pipeline namespace', { socketId: socket.id });
      });
    });
  }

  /**
   * Register a run and return its ID
   */
  createOperation(circuitName: string): string {
    const operationId = uuidv4();
    this.operations.set(operationId, {
      operationId,
      circuitName,
      startedAt: new Date(),
      status: 'running',
      eventCount: 0,
      completedPhases: [],
      eventHistory: [],
    });
    wsLogger.info('Created pipeline operation', { operationId, circuitName });
    return operationId;
  }

  emitProgress(event: PipelineProgressEvent): void {
    const operation = this.operations.get(event.operationId);
    if (!operation) {
      wsLogger.warn('Emitting to unknown operation', { operationId: event.operationId });
      return;
    }

    operation.lastEvent = event;
    operation.eventCount++;
    operation.eventHistory.push(event);
    if (operation.eventHistory.length > MAX_EVENT_HISTORY) {
      operation.eventHistory.shift();
    }

    if (event.type === PipelineEventType.PHASE_COMPLETE && event.phase) {
      if (!operation.completedPhases.includes(event.phase)) {
        operation.completedPhases.push(event.phase);
      }
    }

    if (event.type === PipelineEventType.COMPLETE) {
      operation.status = 'complete';
      operation.schematicPath = event.schematic_path;
      operation.reportPath = event.report_path;
      operation.accepted = event.accepted;
      this.scheduleCleanup(event.operationId);
    } else if (event.type === PipelineEventType.ERROR) {
      operation.status = 'error';
      operation.errorMessage = event.error_message;
      this.scheduleCleanup(event.operationId);
    }

    this.namespace.to(`operation:${event.operationId}`).emit('progress', event);
    this.emit('progress', event.operationId, event);
  }

  /**
   * Mark a run as failed outside the pipeline's own error reporting
   */
  failOperation(operationId: string, error: Error | string): void {
    const operation = this.operations.get(operationId);
    if (!operation || operation.status !== 'running') return;

    const errorMessage = error instanceof Error ? error.message : error;
    this.emitProgress(
      createProgressEvent(
        operationId,
        PipelineEventType.ERROR,
        operation.lastEvent?.progress_percentage ?? 0,
        `Error: ${errorMessage}`,
        { error_message: errorMessage, error_code: 'PIPELINE_FAILED' }
      )
    );
  }

  private scheduleCleanup(operationId: string): void {
    const existing = this.cleanupTimers.get(operationId);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.operations.delete(operationId);
      this.cleanupTimers.delete(operationId);
      wsLogger.debug('Cleaned up finished operation', { operationId });
    }, this.retentionMs);
    timer.unref();
    this.cleanupTimers.set(operationId, timer);
  }

  getOperation(operationId: string): PipelineOperation | undefined {
    return this.operations.get(operationId);
  }

  getStats(): { activeOperations: number; connectedClients: number } {
    let active = 0;
    for (const op of this.operations.values()) {
      if (op.status === 'running') active++;
    }
    return { activeOperations: active, connectedClients: this.namespace.sockets.size };
  }

  /**
   * Cancel pending cleanups; used on shutdown
   */
  close(): void {
    for (const timer of this.cleanupTimers.values()) clearTimeout(timer);
    this.cleanupTimers.clear();
  }
}
