/**
 * Unit tests for Application Insights telemetry module
 */

const mockTags: Record<string, string> = {};

const mockClient = {
  trackEvent: jest.fn(),
  trackMetric: jest.fn(),
  trackDependency: jest.fn(),
  trackException: jest.fn(),
  trackTrace: jest.fn(),
  flush: jest.fn((options: { callback?: (response: string) => void }) => options.callback?.('')),
  context: {
    tags: mockTags,
    keys: { cloudRole: 'ai.cloud.role' },
  },
};

jest.mock('applicationinsights', () => {
  const chain = {
    setAutoCollectRequests: () => chain,
    setAutoCollectExceptions: () => chain,
    setAutoCollectDependencies: () => chain,
    setAutoCollectConsole: () => chain,
    setSendLiveMetrics: () => chain,
    setDistributedTracingMode: () => chain,
  };
  return {
    setup: jest.fn(() => chain),
    start: jest.fn(),
    defaultClient: mockClient,
    DistributedTracingModes: { AI_AND_W3C: 1 },
    Contracts: { SeverityLevel: { Verbose: 0, Information: 1, Warning: 2, Error: 3, Critical: 4 } },
  };
});

const originalEnv = process.env;

async function loadTelemetry() {
  return import('../../src/lib/utils/telemetry');
}

describe('Telemetry Module', () => {
  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv };
    delete process.env.APPLICATIONINSIGHTS_CONNECTION_STRING;
    jest.spyOn(console, 'warn').mockImplementation();
    jest.spyOn(console, 'info').mockImplementation();
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  describe('without a connection string', () => {
    it('should stay disabled and send nothing', async () => {
      const telemetry = await loadTelemetry();
      telemetry.initializeTelemetry();
      telemetry.initializeTelemetry();

      expect(telemetry.getTelemetryClient()).toBeNull();
      telemetry.trackEvent('ChatApi.ValidationFailed', { field: 'message' });
      telemetry.trackChatStream({
        model: 'gpt-4o',
        outcome: 'completed',
        durationMs: 120,
        fragments: 3,
        characters: 40,
      });
      await expect(telemetry.flushTelemetry()).resolves.toBeUndefined();

      expect(mockClient.trackEvent).not.toHaveBeenCalled();
      expect(mockClient.trackDependency).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('with a connection string', () => {
    it('should tag the cloud role', async () => {
      const telemetry = await loadTelemetry();
      telemetry.initializeTelemetry('InstrumentationKey=test-key');

      expect(telemetry.getTelemetryClient()).toBe(mockClient);
      expect(mockClient.context.tags['ai.cloud.role']).toBe('math-chat-relay');
    });

    it('should record a completed stream as a dependency, event and metric', async () => {
      const telemetry = await loadTelemetry();
      telemetry.initializeTelemetry('InstrumentationKey=test-key');

      telemetry.trackChatStream({
        model: 'gpt-4o',
        outcome: 'completed',
        durationMs: 120,
        fragments: 3,
        characters: 40,
      });

      const properties = { model: 'gpt-4o', outcome: 'completed' };
      expect(mockClient.trackDependency).toHaveBeenCalledWith({
        name: 'chat.completions.create',
        dependencyTypeName: 'OpenAI API',
        data: 'gpt-4o',
        duration: 120,
        success: true,
        resultCode: 200,
        properties,
      });
      expect(mockClient.trackEvent).toHaveBeenCalledWith({
        name: 'ChatApi.Stream',
        properties,
        measurements: { fragments: 3, characters: 40, durationMs: 120 },
      });
      expect(mockClient.trackMetric).toHaveBeenCalledWith({
        name: 'ChatApi.RequestTime',
        value: 120,
        properties,
      });
    });

    it('should mark a failed stream as an unsuccessful dependency', async () => {
      const telemetry = await loadTelemetry();
      telemetry.initializeTelemetry('InstrumentationKey=test-key');

      telemetry.trackChatStream({
        model: 'gpt-4o-mini',
        outcome: 'failed',
        durationMs: 15,
        fragments: 0,
        characters: 0,
      });

      expect(mockClient.trackDependency).toHaveBeenCalledWith(
        expect.objectContaining({ success: false, resultCode: 500 })
      );
    });

    it('should forward traces, static request timings and flush', async () => {
      const telemetry = await loadTelemetry();
      telemetry.initializeTelemetry('InstrumentationKey=test-key');

      telemetry.trackTrace('Serving static file', telemetry.SeverityLevel.Verbose, { path: '/' });
      telemetry.trackStaticRequest('not_found', 4);
      await telemetry.flushTelemetry();

      expect(mockClient.trackTrace).toHaveBeenCalledWith({
        message: 'Serving static file',
        severity: 0,
        properties: { path: '/' },
      });
      expect(mockClient.trackMetric).toHaveBeenCalledWith({
        name: 'WebServer.RequestTime',
        value: 4,
        properties: { outcome: 'not_found' },
      });
      expect(mockClient.flush).toHaveBeenCalledTimes(1);
    });
  });
});
