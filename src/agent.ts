import { loadConfig } from './app/app.config';
import { NetworkPrintTransport } from './services/network-print.transport';
import { RelayClient } from './services/relay-client.service';
import { RelaySession } from './services/relay-session.service';
import { RelayAgentService } from './services/relay-agent.service';
import { createLogger, errorMessage } from './utils/logger';

/**
 * Printer-side process: runs next to a kitchen printer that the POS cannot
 * reach directly and prints what the relay holds for it.
 */
function bootstrap(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, silent: config.nodeEnv === 'test' });

  if (!config.relay || !config.agent) {
    throw new Error(
      'Relay agent needs RELAY_ENABLED=true, RELAY_BASE_URL, RELAY_API_KEY, RELAY_RESTAURANT_ID, ' +
        'RELAY_AGENT_PRINTER_ID and RELAY_AGENT_PRINTER_HOST',
    );
  }

  const client = new RelayClient(
    {
      baseUrl: config.relay.baseUrl,
      apiKey: config.relay.apiKey,
      restaurantId: config.relay.restaurantId,
      requestTimeoutMs: config.relay.requestTimeoutMs,
    },
    logger,
  );
  const session = new RelaySession(client, logger, {
    registration: {
      name: `${config.relay.restaurantName} printer agent`,
      printerId: config.agent.printerId,
      capabilities: ['plain_text', 'thermal_printing'],
    },
    heartbeatIntervalMs: config.relay.heartbeatIntervalMs,
    maxHeartbeatFailures: config.relay.maxHeartbeatFailures,
    reconnectStepMs: config.relay.reconnectStepMs,
    maxReconnectAttempts: config.relay.maxReconnectAttempts,
  });
  const agent = new RelayAgentService(client, session, new NetworkPrintTransport(logger), logger, {
    printerId: config.agent.printerId,
    printer: { host: config.agent.printerHost, port: config.agent.printerPort },
    pollIntervalMs: config.agent.pollIntervalMs,
    printTimeoutMs: config.dispatch.timeoutMs,
  });

  agent.start().catch((error: unknown) => {
    logger.error('Relay agent failed to start', { error: errorMessage(error) });
  });

  // Timers are unref'd; keep the process alive until told to stop
  const keepAlive = setInterval(() => undefined, 60 * 60 * 1000);

  const shutdown = (signal: string): void => {
    logger.info('Relay agent shutting down', { signal, ...agent.getStatistics() });
    agent.stop();
    clearInterval(keepAlive);
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

bootstrap();
