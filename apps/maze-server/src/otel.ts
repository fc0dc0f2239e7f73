import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";

export type TracingEnv = { OTEL_EXPORTER_OTLP_ENDPOINT?: string; OTEL_SERVICE_NAME?: string };

/** Starts span export for the maze host. Returns the SDK so the caller can flush it on shutdown. */
export function startTracing(env: TracingEnv = process.env): NodeSDK {
  const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT || "http://localhost:4318";
  const serviceName = env.OTEL_SERVICE_NAME || "maze-server";

  const sdk = new NodeSDK({ traceExporter: new OTLPTraceExporter({ url: `${endpoint}/v1/traces` }), serviceName });
  sdk.start();
  return sdk;
}
