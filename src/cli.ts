#!/usr/bin/env node
/**
 * Interactive dictation console
 *
 * Run with `npm start`. Typed lines stand in for recognised speech: while
 * listening, each line is one recognition segment; otherwise a plain line is
 * submitted to the pipeline directly.
 *
 * Uses Supabase when SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are set,
 * otherwise an in-memory inventory that is lost on exit.
 */

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { resolveVoiceConfig } from './config/voice.js';
import { initTracing } from './config/tracing.js';
import { supabaseService } from './db/supabase.js';
import { InMemoryInventoryRepository } from './repositories/InMemoryInventoryRepository.js';
import type { InventoryRepository } from './repositories/InventoryRepository.js';
import { SupabaseInventoryRepository } from './repositories/SupabaseInventoryRepository.js';
import { CaptureController } from './services/capture/captureController.js';
import type { RecognitionEngine, RecognitionListener } from './services/capture/recognitionEngine.js';
import { OpenAIExtractionClient } from './services/extraction/extractionClient.js';
import { ExtractionPipeline } from './services/extractionPipeline.js';
import { VoiceSession } from './services/voiceSession.js';
import { TASK_KINDS, type ExtractionState, type TaskKind } from './types/voice.js';
import { errorMessage } from './utils/errors.js';

/**
 * Recognition engine fed from the terminal: one typed line is one segment
 */
class LineRecognitionEngine implements RecognitionEngine {
  private listener: RecognitionListener | null = null;

  get active(): boolean {
    return this.listener !== null;
  }

  isAvailable(): boolean {
    return true;
  }

  start(listener: RecognitionListener): void {
    this.listener = listener;
    listener.onReady();
  }

  hear(line: string): void {
    this.listener?.onSegment(line, 1);
  }

  stop(): void {
    this.listener = null;
  }

  cancel(): void {
    this.listener = null;
  }

  release(): void {
    this.listener = null;
  }
}

const HELP = [
  'Commands:',
  `  /start <${TASK_KINDS.join('|')}>  begin a new record`,
  '  /listen                  start dictating (each line is heard speech)',
  '  /stop                    stop dictating and process what was heard',
  '  /choose <field> <id>     pick a candidate for a reference',
  '  /create <field>          create a missing vendor, location or equipment',
  '  /retry                   resend the last failed message',
  '  /confirm                 save the record',
  '  /cancel                  abandon the record',
  '  /quit',
].join('\n');

function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

function printState(state: ExtractionState): void {
  switch (state.status) {
    case 'idle':
      if (state.message) console.log(`· ${state.message}`);
      return;
    case 'processing':
      console.log('… processing');
      return;
    case 'extracted': {
      const { data } = state;
      console.log(`\n${data.summary}`);
      console.log(`  fields: ${JSON.stringify(data.task.fields)}`);
      console.log(data.complete ? '  ✅ ready to confirm' : `  missing: ${data.missingRequired.join(', ')}`);
      for (const warning of data.warnings) {
        console.log(`  ⚠️  ${warning}`);
      }
      for (const [field, reference] of Object.entries(data.references)) {
        if (reference?.resolution.outcome === 'ambiguous') {
          const candidates: { id: string; name: string }[] = reference.resolution.candidates;
          const options = candidates.map((c) => `${c.id} (${c.name})`).join(', ');
          console.log(`  ${field}: ${options}`);
        } else if (reference?.resolution.outcome === 'needs-confirmation') {
          const { candidate } = reference.resolution;
          console.log(`  ${field}: ${candidate.id} (${candidate.name})?`);
        }
      }
      return;
    }
    case 'error':
      console.log(`❌ ${state.message}${state.retryable ? ' (use /retry)' : ''}`);
      return;
  }
}

function createRepository(): InventoryRepository {
  if (supabaseService.isConfigured()) {
    console.log('[CLI] Using Supabase inventory');
    return new SupabaseInventoryRepository();
  }
  console.log('[CLI] Supabase not configured, using an in-memory inventory');
  return new InMemoryInventoryRepository();
}

async function main(): Promise<void> {
  await initTracing();
  const config = resolveVoiceConfig();

  const engine = new LineRecognitionEngine();
  const capture = new CaptureController(engine, config.capture);
  const pipeline = new ExtractionPipeline({
    repository: createRepository(),
    client: new OpenAIExtractionClient(config.extraction.model),
    config: config.extraction,
    matching: config.matching,
    maxExchanges: config.maxExchanges,
    speak: (text) => console.log(`🔊 ${text}`),
  });
  const session = new VoiceSession(capture, pipeline);
  pipeline.state.subscribe(printState);

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  console.log(HELP);

  const run = async (line: string): Promise<void> => {
    const [command = '', ...args] = line.trim().split(/\s+/);

    switch (command) {
      case '':
        return;
      case '/help':
        console.log(HELP);
        return;
      case '/start': {
        const kind = args[0] ?? '';
        if (!isTaskKind(kind)) {
          console.log(`Unknown task kind "${kind}"`);
          return;
        }
        await session.startTask(kind);
        return;
      }
      case '/listen':
        session.startListening();
        return;
      case '/stop':
        session.stopListening();
        await session.idle();
        return;
      case '/choose': {
        const [field, id] = args;
        if (!field || !id) {
          console.log('Usage: /choose <field> <id>');
          return;
        }
        await pipeline.chooseCandidate(field, id);
        return;
      }
      case '/create': {
        const [field] = args;
        if (!field) {
          console.log('Usage: /create <field>');
          return;
        }
        const id = await pipeline.createMissingReference(field);
        console.log(`Created ${field} ${id}`);
        return;
      }
      case '/retry':
        await pipeline.retryLastTranscript();
        return;
      case '/confirm': {
        const id = await session.confirm();
        console.log(`Saved as ${id}`);
        return;
      }
      case '/cancel':
        session.cancel();
        return;
      case '/quit':
        rl.close();
        return;
      default:
        if (command.startsWith('/')) {
          console.log(`Unknown command ${command}, try /help`);
        } else if (engine.active) {
          engine.hear(line);
        } else {
          await pipeline.submitTranscript(line);
        }
    }
  };

  // Lines are handled one at a time, in order
  let queue: Promise<void> = Promise.resolve();
  rl.on('line', (line) => {
    queue = queue
      .then(() => run(line))
      .catch((error) => {
        console.error(`❌ ${errorMessage(error)}`);
      })
      .finally(() => rl.prompt());
  });

  rl.on('close', () => {
    session.close();
    console.log('👋 Bye');
  });

  rl.prompt();
}

main().catch((error) => {
  console.error('❌ Failed to start:', errorMessage(error));
  process.exit(1);
});
