import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { resourceFromAttributes } from '@opentelemetry/resources';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';

/**
 * Starts OpenTelemetry tracing for the HTTP server.
 * Returns null when `OTEL_EXPORTER_OTLP_ENDPOINT` is unset so local runs and the
 * CLI do not try to ship spans to a collector that is not there.
 */
export function initTracer(serviceName: string): NodeSDK | null {
  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!endpoint) {
    return null;
  }

  const traceExporter = new OTLPTraceExporter({
    url: endpoint,
    headers: {},
  });

  const resource = resourceFromAttributes({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: process.env.APP_VERSION || '1.0.0',
    'deployment.environment': process.env.NODE_ENV || 'development',
  });

  const sdk = new NodeSDK({
    resource,
    spanProcessors: [new BatchSpanProcessor(traceExporter)],
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-http': {
          enabled: true,
        },
        '@opentelemetry/instrumentation-express': {
          enabled: true,
        },
        '@opentelemetry/instrumentation-nestjs-core': {
          enabled: true,
        },
      }),
    ],
  });

  sdk.start();
  console.log(`OpenTelemetry tracer initialized for: ${serviceName}`);

  return sdk;
}

export async function shutdownTracer(sdk: NodeSDK | null): Promise<void> {
  if (!sdk) {
    return;
  }
  try {
    await sdk.shutdown();
    console.log('OpenTelemetry tracer shut down');
  } catch (error) {
    console.error('Error shutting down tracer:', error);
  }
}
