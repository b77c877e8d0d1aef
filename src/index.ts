/**
 * Server entry point
 *
 * Loads configuration, initializes monitoring, and starts the HTTP server.
 */

import 'dotenv/config';

// Sentry should be initialized first to catch all errors
import { initializeSentry, closeSentry } from './lib/utils/sentry';
import { initializeTelemetry, flushTelemetry } from './lib/utils/telemetry';

initializeSentry();
initializeTelemetry();

import { AppConfig, hasOpenAIKey, loadConfig } from './types/config';
import { createOpenAIClient } from './lib/openai/client';
import { OpenAICompletionProvider } from './lib/chat/provider';
import { createApp } from './app';
import * as logger from './lib/utils/logger';

function printStartupInfo(config: AppConfig): void {
  const rule = '='.repeat(60);
  const lines = [rule, 'Math Chat Server', rule];

  if (!hasOpenAIKey(config)) {
    lines.push(
      'WARNING: OPENAI_API_KEY not found!',
      'Create a .env file with:',
      'OPENAI_API_KEY=your_api_key_here',
      'The server will run but chat functionality will be disabled.'
    );
  } else {
    lines.push('OpenAI API key loaded');
  }

  lines.push(
    `Starting server at http://${config.host}:${config.port}`,
    'Health check: /health',
    'Press Ctrl+C to stop',
    rule,
    '',
    'Try asking:',
    '- "Explain Laplace transform"',
    '- "What is Heaviside step function?"',
    '- "Derive the quadratic formula"',
    ''
  );

  console.log(lines.join('\n'));
}

function main(): void {
  const config = loadConfig();
  const client = createOpenAIClient(config);
  const provider = client
    ? new OpenAICompletionProvider(client, { maxTokens: config.maxTokens })
    : null;

  printStartupInfo(config);

  const app = createApp({ config, provider });
  const server = app.listen(config.port, config.host, () => {
    logger.info('Server listening', { host: config.host, port: config.port });
  });

  server.on('error', (error) => {
    logger.logError('Server error', error, { host: config.host, port: config.port });
    process.exitCode = 1;
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      Promise.all([closeSentry(), flushTelemetry()])
        .then(() => logger.info('Server stopped gracefully'))
        .catch((error: unknown) => logger.logError('Error flushing monitoring data', error))
        .finally(() => process.exit(0));
    });
    // Open SSE streams would otherwise keep close() waiting
    server.closeAllConnections();
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.logError('Failed to start server', error);
  process.exitCode = 1;
}
