import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadServerConfig } from './config/server.config';
import { createCircleArtService } from './services/circle-art.service';
import { SocketProgressNotifier } from './services/progress-notifier.service';
import { WorkerManagerService } from './services/worker-manager.service';

const config = loadServerConfig();

// Initialize the worker pool
const workerManager = new WorkerManagerService(config.workerCount);
const circleArtService = createCircleArtService(workerManager, {
  workerCount: config.workerCount,
  parallelThreshold: config.parallelThreshold,
  progressInterval: config.progressInterval
});

// Initialize Socket.IO, attached once the HTTP server exists
const io = new SocketIOServer({
  cors: {
    origin: config.nodeEnv === 'production' ? false : config.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

const app = createApp({
  config,
  circleArtService,
  notifier: new SocketProgressNotifier(io)
});
const httpServer = createServer(app);
io.attach(httpServer);

// Socket.IO connection handling
io.on('connection', (socket) => {
  console.log(`🔌 Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`⚠️  Socket error for ${socket.id}:`, error);
  });
});

// Graceful shutdown: terminate all workers
const shutdown = (signal: string) => {
  console.log(`${signal} received, cleaning up workers...`);
  workerManager.terminateAll();
  io.close();
  httpServer.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
httpServer.listen(config.port, () => {
  console.log(`⚡️ Server is running on port ${config.port}`);
  console.log(`🎨 Circle Poster API ready at http://localhost:${config.port}/api`);
  console.log(`🧵 Sampling with up to ${config.workerCount} worker threads`);
});

export default app;
