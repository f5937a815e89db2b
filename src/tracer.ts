/**
 * @file Starts OpenTelemetry tracing for a command run.
 *
 * @remarks
 * Spans are created through `@opentelemetry/api` everywhere in the code; without
 * a running SDK they are no-ops. The SDK is started only when
 * `OTEL_EXPORTER_OTLP_ENDPOINT` is set, and the OTLP exporter reads its
 * endpoint, headers and protocol from the standard OpenTelemetry variables:
 * - `OTEL_EXPORTER_OTLP_ENDPOINT`: e.g. `http://localhost:4318`.
 * - `OTEL_EXPORTER_OTLP_HEADERS`: e.g. `api-key=test-secret`.
 * - `OTEL_SERVICE_NAME`: overrides the default service name.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import type { Logger as WinstonLogger } from 'winston';

let sdk: NodeSDK | undefined;

/**
 * Starts the NodeSDK with a batched OTLP/HTTP exporter.
 * Returns false (and starts nothing) when no OTLP endpoint is configured.
 * A failure to start is logged; the run continues without tracing.
 */
export function initTracer(
  logger: WinstonLogger,
  serviceName = 'url-pulse'
): boolean {
  if (sdk) {
    return true;
  }
  if (!process.env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    logger.debug('OTEL_EXPORTER_OTLP_ENDPOINT not set; tracing disabled.');
    return false;
  }

  try {
    sdk = new NodeSDK({
      serviceName: process.env.OTEL_SERVICE_NAME || serviceName,
      traceExporter: new OTLPTraceExporter(),
    });
    sdk.start();
    logger.info('OpenTelemetry NodeSDK started with the OTLP exporter.');
    return true;
  } catch (error) {
    logger.error('Failed to initialize or start OpenTelemetry SDK:', { error });
    sdk = undefined;
    return false;
  }
}

/**
 * Flushes buffered spans and stops the SDK, if it was started.
 */
export async function shutdownTracer(logger: WinstonLogger): Promise<void> {
  if (!sdk) {
    return;
  }
  const running = sdk;
  sdk = undefined;
  try {
    await running.shutdown();
    logger.debug('OpenTelemetry tracing terminated gracefully.');
  } catch (error) {
    logger.error('Error shutting down OpenTelemetry tracing', { error });
  }
}
