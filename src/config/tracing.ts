/**
 * OpenTelemetry setup for the voice pipeline
 *
 * Spans cover model calls, reference lookups and storage writes. Where they
 * go is chosen by TRACING_MODE:
 * - 'console': print finished spans to stdout (default when NODE_ENV=development)
 * - 'langfuse': export to a Langfuse instance (model calls show up as generations)
 * - 'disabled': no exporter (default otherwise)
 *
 * Environment Variables:
 * - TRACING_MODE
 * - LANGFUSE_PUBLIC_KEY, LANGFUSE_SECRET_KEY, LANGFUSE_BASEURL (langfuse only)
 */

import { trace } from '@opentelemetry/api';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';
import { registerOTel } from '@vercel/otel';
import { z } from 'zod';

export const SERVICE_NAME = 'voice-inventory-core';
export const SERVICE_VERSION = '0.1.0';

const TracingEnvSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('disabled') }),
  z.object({ mode: z.literal('console') }),
  z.object({
    mode: z.literal('langfuse'),
    publicKey: z.string({ required_error: 'LANGFUSE_PUBLIC_KEY is required for TRACING_MODE=langfuse' }).min(1),
    secretKey: z.string({ required_error: 'LANGFUSE_SECRET_KEY is required for TRACING_MODE=langfuse' }).min(1),
    baseUrl: z.string({ required_error: 'LANGFUSE_BASEURL is required for TRACING_MODE=langfuse' }).url(),
  }),
]);

export type TracingSettings = z.infer<typeof TracingEnvSchema>;

/**
 * Read the tracing mode and its credentials from the environment
 *
 * @throws Error naming the missing or invalid variable
 */
export function resolveTracingSettings(env: NodeJS.ProcessEnv = process.env): TracingSettings {
  const blankToUndefined = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);
  const mode = blankToUndefined(env.TRACING_MODE) ?? (env.NODE_ENV === 'development' ? 'console' : 'disabled');

  const parsed = TracingEnvSchema.safeParse({
    mode,
    publicKey: blankToUndefined(env.LANGFUSE_PUBLIC_KEY),
    secretKey: blankToUndefined(env.LANGFUSE_SECRET_KEY),
    baseUrl: blankToUndefined(env.LANGFUSE_BASEURL),
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue?.code === 'invalid_union_discriminator') {
      throw new Error(`Invalid TRACING_MODE="${mode}". Must be 'console', 'langfuse', or 'disabled'`);
    }
    throw new Error(issue?.message ?? 'Invalid tracing configuration');
  }
  return parsed.data;
}

/**
 * Register the exporter selected by the environment. Call once at the top of
 * an entry point, before the pipeline is built.
 */
export async function initTracing(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const settings = resolveTracingSettings(env);

  switch (settings.mode) {
    case 'disabled':
      console.log('[Tracing] Disabled');
      return;
    case 'console':
      registerOTel({ serviceName: SERVICE_NAME, traceExporter: new ConsoleSpanExporter() });
      console.log('[Tracing] Enabled with console exporter');
      return;
    case 'langfuse': {
      // Loaded only when selected
      const { LangfuseExporter } = await import('langfuse-vercel');
      const { publicKey, secretKey, baseUrl } = settings;
      registerOTel({
        serviceName: SERVICE_NAME,
        traceExporter: new LangfuseExporter({ publicKey, secretKey, baseUrl }),
      });
      console.log(`[Tracing] Enabled with Langfuse exporter (${baseUrl})`);
      return;
    }
  }
}

/**
 * Tracer for the project's own spans. A no-op until `initTracing` registers
 * an exporter.
 */
export function getTracer() {
  return trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
}
