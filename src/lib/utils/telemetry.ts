/**
 * Application Insights telemetry
 *
 * Relay-level signals (stream outcomes, static file requests) and the trace
 * and exception sinks the logger writes to. Everything is a no-op until a
 * connection string is configured.
 */

import * as appInsights from 'applicationinsights';
import { getConfig } from '../../types/config';

export type TelemetryProperties = Record<string, string>;

const CLOUD_ROLE = 'math-chat-relay';

let telemetryClient: appInsights.TelemetryClient | null = null;
let isInitialized = false;

/**
 * Initialize Application Insights
 *
 * Called once at startup, before the HTTP server is created so request
 * auto-collection can hook into it.
 */
export function initializeTelemetry(
  connectionString: string = getConfig('APPLICATIONINSIGHTS_CONNECTION_STRING', '')
): void {
  if (isInitialized) {
    return;
  }
  isInitialized = true;

  if (!connectionString) {
    console.warn(
      '[Telemetry] APPLICATIONINSIGHTS_CONNECTION_STRING not configured. Custom telemetry disabled.'
    );
    return;
  }

  try {
    appInsights
      .setup(connectionString)
      .setAutoCollectRequests(true)
      .setAutoCollectExceptions(true)
      .setAutoCollectDependencies(true)
      // The logger already forwards every line as a trace
      .setAutoCollectConsole(false)
      .setSendLiveMetrics(false)
      .setDistributedTracingMode(appInsights.DistributedTracingModes.AI_AND_W3C);
    appInsights.start();

    telemetryClient = appInsights.defaultClient;
    telemetryClient.context.tags[telemetryClient.context.keys.cloudRole] = CLOUD_ROLE;

    console.info('[Telemetry] Application Insights initialized successfully');
  } catch (error) {
    console.error('[Telemetry] Failed to initialize Application Insights:', error);
    telemetryClient = null;
  }
}

export function getTelemetryClient(): appInsights.TelemetryClient | null {
  if (!isInitialized) {
    initializeTelemetry();
  }
  return telemetryClient;
}

function withClient(send: (client: appInsights.TelemetryClient) => void): void {
  const client = getTelemetryClient();
  if (client) {
    send(client);
  }
}

/**
 * Track a custom event
 */
export function trackEvent(
  name: string,
  properties?: TelemetryProperties,
  measurements?: Record<string, number>
): void {
  withClient((client) => client.trackEvent({ name, properties, measurements }));
}

export function trackException(error: Error, properties?: TelemetryProperties): void {
  withClient((client) => client.trackException({ exception: error, properties }));
}

export const SeverityLevel = appInsights.Contracts.SeverityLevel;
export type SeverityLevel = appInsights.Contracts.SeverityLevel;

/**
 * Track a trace (one log line)
 */
export function trackTrace(
  message: string,
  severity: SeverityLevel = SeverityLevel.Information,
  properties?: TelemetryProperties
): void {
  withClient((client) => client.trackTrace({ message, severity, properties }));
}

export interface StreamTelemetry {
  model: string;
  outcome: 'completed' | 'failed' | 'cancelled';
  durationMs: number;
  fragments: number;
  characters: number;
}

/**
 * Records one /chat stream: the OpenAI call as a dependency, a
 * `ChatApi.Stream` event carrying the fragment counts, and the request
 * time metric. A cancelled stream counts as a successful dependency call.
 */
export function trackChatStream(stream: StreamTelemetry): void {
  withClient((client) => {
    const properties: TelemetryProperties = { model: stream.model, outcome: stream.outcome };
    const failed = stream.outcome === 'failed';

    client.trackDependency({
      name: 'chat.completions.create',
      dependencyTypeName: 'OpenAI API',
      data: stream.model,
      duration: stream.durationMs,
      success: !failed,
      resultCode: failed ? 500 : 200,
      properties,
    });
    client.trackEvent({
      name: 'ChatApi.Stream',
      properties,
      measurements: {
        fragments: stream.fragments,
        characters: stream.characters,
        durationMs: stream.durationMs,
      },
    });
    client.trackMetric({ name: 'ChatApi.RequestTime', value: stream.durationMs, properties });
  });
}

export type StaticRequestOutcome = 'success' | 'not_found' | 'rejected' | 'error';

export function trackStaticRequest(outcome: StaticRequestOutcome, durationMs: number): void {
  withClient((client) =>
    client.trackMetric({ name: 'WebServer.RequestTime', value: durationMs, properties: { outcome } })
  );
}

/**
 * Flush buffered telemetry; call before shutdown
 */
export function flushTelemetry(): Promise<void> {
  return new Promise((resolve) => {
    const client = getTelemetryClient();
    if (client) {
      client.flush({ callback: () => resolve() });
    } else {
      resolve();
    }
  });
}
