import http from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { adapterFactory } from './adapters';
import { createApp } from './app';
import { config } from './config';
import { loadCredentialTable } from './services/credential.service';
import { DeviceManager } from './services/device-manager.service';
import { DeviceRegistry } from './services/device-registry.service';
import { NetworkDiscovery } from './services/discovery.service';
import { EventHub } from './services/event-hub.service';
import { JobDispatcher } from './services/job-dispatcher.service';
import { JobStore } from './services/job-store.service';
import { FilePayloadStore } from './services/payload-store.service';
import { RemoteBridge } from './services/remote-bridge.service';
import { NetSnmpProbe } from './services/snmp.service';
import { FileStateStore } from './services/state-store.service';
import { logger } from './utils/logger';

const events = new EventHub();
const state = new FileStateStore(config.dataDir);
const payloads = new FilePayloadStore(config.payloadDir);
const snmp = new NetSnmpProbe({ community: config.snmp.community, timeoutMs: config.snmp.timeoutMs });
const createAdapter = adapterFactory({ snmp, timeoutMs: config.health.probeTimeoutMs });

const registry = new DeviceRegistry(createAdapter);
const jobs = new JobStore(state);
const discovery = new NetworkDiscovery({
  snmp,
  createAdapter,
  credentials: loadCredentialTable(config.discovery.credentialsFile),
  concurrency: config.discovery.concurrency,
});

const manager = new DeviceManager({
  registry,
  discovery,
  jobs,
  payloads,
  events,
  state,
  discoverySettings: config.discovery,
  health: config.health,
  maxRetries: config.jobs.maxRetries,
});

const dispatcher = new JobDispatcher({ registry, jobs, payloads, events, settings: config.jobs });

const bridge = new RemoteBridge({
  events,
  admitter: manager,
  jobs,
  settings: { ...config.remote, requestTimeoutMs: config.health.probeTimeoutMs * 2 },
});

const app = createApp({
  manager,
  jobs,
  dispatcher,
  bridge,
  version: config.version,
  apiKey: config.remote.apiKey,
  maxPayloadBytes: config.maxPayloadBytes,
});
const server = http.createServer(app);
const io = new SocketIOServer(server, {
  cors: { origin: '*' },
});

// Socket.IO connection
io.on('connection', (socket) => {
  logger.info({ id: socket.id }, 'Client connected');

  socket.on('disconnect', () => {
    logger.info({ id: socket.id }, 'Client disconnected');
  });
});

// Wire lifecycle events to Socket.IO
events.onAny((event, data) => {
  io.emit(event, data);
});

// Remote commands delivered by polling
events.onRemote('command.discover_devices', () => {
  manager.discover().catch((error: unknown) => logger.error({ error }, 'Remote discovery request failed'));
});
events.onRemote('command.get_device_status', () => {
  manager.runHealthCycle().catch((error: unknown) => logger.error({ error }, 'Remote status request failed'));
});

// Initialize services
manager.restore();
jobs.restore();

async function boot(): Promise<void> {
  dispatcher.start();
  bridge.start();

  if (config.discovery.onStart) {
    try {
      await manager.discover();
    } catch (error) {
      logger.error({ error }, 'Startup discovery failed');
    }
  }
  manager.startHealthLoop();
  events.emit('system.started', { version: config.version, devices: manager.list().length });
}

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  manager.stopHealthLoop();
  bridge.stop();
  dispatcher.stop();
  manager.persist();

  io.close();
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Start server
server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host, version: config.version }, 'Print fleet gateway started');
  boot().catch((error: unknown) => logger.error({ error }, 'Startup failed'));
});

export { app, server, io };
