/* index.ts — Express + Socket.io server streaming the LEACH-DMS simulation */

import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp } from './app';
import { SimulationController } from './controller';
import { getSocketCorsConfig } from './security';
import { loadConfigFromEnv, serverConfigSchema } from './config';
import { drainSchema } from './validation';

const { PORT, TICK_INTERVAL_MS } = serverConfigSchema.parse(process.env);

const controller = new SimulationController(loadConfigFromEnv(process.env));
const app = createApp(controller);

const httpServer = createServer(app);
const io = new Server(httpServer, {
  cors: getSocketCorsConfig(),
});

// ── Socket.io ────────────────────────────────────────────────

io.on('connection', (socket) => {
  console.log(`[WS] Client connected: ${socket.id}`);

  socket.emit('leach:history', controller.sim.getEventHistory());

  socket.on('cmd:pause', () => controller.pause());
  socket.on('cmd:resume', () => controller.resume());

  socket.on('cmd:drain', (data: unknown) => {
    const parsed = drainSchema.safeParse(data);
    if (!parsed.success) return;
    controller.drain(parsed.data.nodeId, parsed.data.amount);
  });

  socket.on('disconnect', () => {
    console.log(`[WS] Client disconnected: ${socket.id}`);
  });
});

// ── Start ───────────────────────────────────────────────────

// One sim time unit per wall tick
setInterval(() => {
  try {
    const snapshot = controller.tick(1);
    io.emit('leach:state', snapshot);
  } catch (err) {
    console.error('[TICK] Error in simulation step:', err);
  }
}, TICK_INTERVAL_MS);

httpServer.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`Port ${PORT} is already in use. Kill the other process or use a different port.`);
  } else {
    console.error('Server error:', err);
  }
  process.exit(1);
});

httpServer.listen(PORT, '0.0.0.0', () => {
  const { config } = controller.sim;
  console.log(`\n  LEACH-DMS Cluster Monitor`);
  console.log(`  ──────────────────────────`);
  console.log(`  HTTP:      http://0.0.0.0:${PORT}`);
  console.log(`  WebSocket: ws://0.0.0.0:${PORT}`);
  console.log(`  Tick:      ${TICK_INTERVAL_MS} ms per time unit`);
  console.log(`  Nodes:     ${config.nodeCount}`);
  console.log(`  DMS:       ${config.dmsProfile} profile, ${config.energyModel} energy model`);
  console.log(`  ──────────────────────────\n`);
});
