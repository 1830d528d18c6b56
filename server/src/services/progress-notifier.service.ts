import { Server as SocketIOServer } from 'socket.io';

export type CircleArtEvent = 'circle-art:progress' | 'circle-art:complete' | 'circle-art:error';

/**
 * Pushes job events to a single connected client
 */
export interface ProgressNotifier {
  notify(socketId: string, event: CircleArtEvent, payload: Record<string, unknown>): void;
}

export class SocketProgressNotifier implements ProgressNotifier {
  constructor(private readonly io: SocketIOServer) {}

  notify(socketId: string, event: CircleArtEvent, payload: Record<string, unknown>): void {
    this.io.to(socketId).emit(event, payload);
  }
}
