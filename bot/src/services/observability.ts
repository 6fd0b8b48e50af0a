import { trace, SpanAttributes, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { config } from '../utils/config';
import { logger } from '../utils/logger';

export class ObservabilityService {
  private tracer = trace.getTracer('voice-insight-bot');
  private sdk?: NodeSDK;

  initialize(): void {
    const { otlpEndpoint, otlpApiKey } = config.observability;
    if (!otlpEndpoint) {
      logger.info('OTLP_ENDPOINT not set, trace export disabled');
      return;
    }

    try {
      const traceExporter = new OTLPTraceExporter({
        url: `${otlpEndpoint}/v1/traces`,
        headers: otlpApiKey ? { Authorization: `Bearer ${otlpApiKey}` } : {},
      });

      this.sdk = new NodeSDK({
        traceExporter,
        instrumentations: [],
      });

      this.sdk.start();
      logger.info('Observability service initialized', { otlpEndpoint });
    } catch (error) {
      logger.error('Failed to initialize observability service', error);
    }
  }

  // Cycle and analysis failures come back as values, so `annotate` lets the
  // caller tag the span with the outcome it returned
  async executeWithSpan<T>(
    spanName: string,
    operation: () => Promise<T> | T,
    attributes: SpanAttributes = {},
    annotate?: (result: T) => SpanAttributes
  ): Promise<T> {
    return this.tracer.startActiveSpan(spanName, { kind: SpanKind.INTERNAL, attributes }, async (span) => {
      let result: T;
      try {
        result = await operation();
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        span.recordException(failure);
        span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
        span.end();
        throw error;
      }

      if (annotate) span.setAttributes(annotate(result));
      span.setStatus({ code: SpanStatusCode.OK });
      span.end();
      return result;
    });
  }

  createCycleTraceId(guildId: string, startTs: number): string {
    return `cycle:${guildId}:${startTs}`;
  }

  async shutdown(): Promise<void> {
    if (!this.sdk) return;
    try {
      await this.sdk.shutdown();
    } catch (error) {
      logger.warn('Failed to flush traces on shutdown', error);
    }
  }
}

export const observabilityService = new ObservabilityService();
