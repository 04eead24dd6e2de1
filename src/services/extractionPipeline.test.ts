import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { ExtractionPipeline } from "./extractionPipeline.js";
import type { ExtractionClient, ExtractionRequest, ExtractionResult } from "./extraction/extractionClient.js";
import { InMemoryInventoryRepository, type InventorySeed } from "../repositories/InMemoryInventoryRepository.js";
import { makeEquipment, makeLocation, makeVendor } from "../testing/fixtures.js";
import type { ExtractionConfig } from "../config/voice.js";
import type { ExtractionState, TaskUpdate } from "../types/voice.js";
import type { EntityKind, EntityRecordByKind, RecordDraft } from "../types/inventory.js";
import { ExtractionError, PersistenceError } from "../utils/errors.js";

type Step = (request: ExtractionRequest) => Promise<ExtractionResult>;

class ScriptedExtractor implements ExtractionClient {
  readonly calls: ExtractionRequest[] = [];
  private readonly steps: Step[];

  constructor(...steps: Step[]) {
    this.steps = steps;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    this.calls.push(request);
    const step = this.steps.shift();
    if (!step) {
      throw new Error("No scripted response left");
    }
    return step(request);
  }
}

const answer =
  (update: TaskUpdate, reply = "Ok.", confidence = 0.9): Step =>
  async () => ({ update, reply, confidence, missingFields: [] });

const failWith =
  (error: Error): Step =>
  async () => {
    throw error;
  };

const CONFIG: ExtractionConfig = {
  model: "test-model",
  lowConfidenceThreshold: 0.7,
  maxRetries: 2,
  backoffMs: 0,
  maxTranscriptChars: 4000,
  rateLimitPerMinute: 100,
  maxCommandWords: 4,
};

function setup(
  client: ScriptedExtractor,
  options: { seed?: InventorySeed; repository?: InMemoryInventoryRepository; config?: Partial<ExtractionConfig> } = {}
) {
  const repository = options.repository ?? new InMemoryInventoryRepository(options.seed);
  const spoken: string[] = [];
  const pipeline = new ExtractionPipeline({
    repository,
    client,
    config: { ...CONFIG, ...options.config },
    speak: (text) => spoken.push(text),
    clock: () => new Date("2026-03-14T10:00:00.000Z"),
  });
  const states: ExtractionState[] = [];
  pipeline.state.subscribe((state) => states.push(state));
  return { pipeline, repository, spoken, states };
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = () => done();
  });
  return { promise, resolve };
}

/**
 * Holds inserts and lookups of one kind until released, and reports when one arrives
 */
class GatedRepository extends InMemoryInventoryRepository {
  readonly arrived = deferred();
  readonly gate = deferred();
  gatedKind: EntityKind | null = null;
  gateInserts = false;

  async listActive<K extends EntityKind>(kind: K): Promise<EntityRecordByKind[K][]> {
    if (kind === this.gatedKind) {
      this.arrived.resolve();
      await this.gate.promise;
    }
    return super.listActive(kind);
  }

  async insert(record: RecordDraft): Promise<string> {
    if (this.gateInserts) {
      this.arrived.resolve();
      await this.gate.promise;
    }
    return super.insert(record);
  }
}

function extracted(state: ExtractionState) {
  assert.equal(state.status, "extracted");
  if (state.status !== "extracted") {
    throw new Error("unreachable");
  }
  return state.data;
}

describe("ExtractionPipeline", () => {
  it("merges a maintenance report, resolves its references and saves it", async () => {
    const client = new ScriptedExtractor(
      answer(
        {
          kind: "maintenance",
          fields: {
            equipment: "INV-0042",
            type: "repair",
            description: "Sostituita batteria",
            vendor: "Medika",
            performedBy: null,
          },
        },
        "**Registrato.** Serve altro?"
      )
    );
    const { pipeline, repository, spoken, states } = setup(client, {
      seed: {
        equipment: [makeEquipment("eq-1", "Pompa infusione Volumat", { barcode: "INV-0042" })],
        vendors: [makeVendor("v-1", "Medika Service"), makeVendor("v-2", "Medika Srl")],
      },
    });

    await pipeline.startTask("maintenance");
    await pipeline.submitTranscript("il tecnico di Medika ha sostituito la batteria della pompa");

    const data = extracted(pipeline.state.value);
    assert.deepEqual(data.task, {
      kind: "maintenance",
      fields: { equipment: "INV-0042", type: "repair", description: "Sostituita batteria", vendor: "Medika" },
    });
    assert.equal(data.complete, true);
    assert.deepEqual(data.missingRequired, []);
    assert.equal(data.references.equipment?.resolution.outcome, "found");
    assert.equal(data.references.vendor?.resolution.outcome, "ambiguous");
    assert.deepEqual(data.warnings, ['"Medika" matches 2 vendor records, choose one']);
    assert.deepEqual(spoken, ["Registrato. Serve altro?"]);
    assert.ok(states.some((state) => state.status === "processing"));

    await pipeline.chooseCandidate("vendor", "v-2");
    assert.deepEqual(extracted(pipeline.state.value).warnings, []);

    const id = await pipeline.confirm();
    assert.deepEqual(repository.listMaintenance("eq-1"), [
      {
        id,
        equipmentId: "eq-1",
        vendorId: "v-2",
        type: "repair",
        description: "Sostituita batteria",
        performedBy: null,
        selfReported: false,
        date: "2026-03-14",
        durationMinutes: null,
        cost: null,
        isWarrantyWork: false,
      },
    ]);
    assert.equal(repository.findById("equipment", "eq-1")?.lastMaintenanceDate, "2026-03-14");
    assert.deepEqual(pipeline.state.value, { status: "idle", message: "Maintenance event saved" });
    assert.equal(pipeline.getFieldSnapshot(), null);
    assert.deepEqual(spoken, ["Registrato. Serve altro?", "Saved."]);
  });

  it("never clears collected values and sends history with the next round", async () => {
    const client = new ScriptedExtractor(
      answer(
        { kind: "location", fields: { name: "Radiologia", floor: "P1", department: null, building: null, notes: null } },
        "Piano?"
      ),
      answer({ kind: "location", fields: { name: null, floor: null, department: "Diagnostica", building: "", notes: null } })
    );
    const { pipeline } = setup(client);

    await pipeline.startTask("location");
    await pipeline.submitTranscript("nuova stanza radiologia al primo piano");
    await pipeline.submitTranscript("reparto di diagnostica per immagini");

    assert.deepEqual(pipeline.getFieldSnapshot(), {
      kind: "location",
      fields: { name: "Radiologia", floor: "P1", department: "Diagnostica" },
    });
    const second = client.calls[1];
    assert.deepEqual(
      second?.context.exchanges.map((exchange) => [exchange.role, exchange.content]),
      [
        ["operator", "nuova stanza radiologia al primo piano"],
        ["assistant", "Piano?"],
      ]
    );
    assert.deepEqual(second?.context.task, { kind: "location", fields: { name: "Radiologia", floor: "P1" } });
    assert.equal(second?.context.today, "2026-03-14");
  });

  it("answers a spoken proceed command without calling the model", async () => {
    const client = new ScriptedExtractor();
    const { pipeline, spoken } = setup(client);

    await pipeline.startTask("location");
    await pipeline.submitTranscript("salva");
    assert.equal(extracted(pipeline.state.value).reply, "Still missing: name.");

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    await pipeline.submitTranscript("basta così");
    const data = extracted(pipeline.state.value);
    assert.equal(data.reply, "Everything needed is here. Confirm to save.");
    assert.equal(data.complete, true);
    assert.equal(client.calls.length, 0);
    assert.deepEqual(spoken, ["Still missing: name.", "Everything needed is here. Confirm to save."]);
  });

  it("abandons the task on a spoken cancel command", async () => {
    const client = new ScriptedExtractor();
    const { pipeline } = setup(client);

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    await pipeline.submitTranscript("annulla");

    assert.deepEqual(pipeline.state.value, { status: "idle", message: "Cancelled by operator" });
    assert.equal(pipeline.getFieldSnapshot(), null);
    assert.equal(client.calls.length, 0);
  });

  it("retries transient failures with increasing attempt numbers", async () => {
    const offline = new ExtractionError("network", "offline");
    const client = new ScriptedExtractor(
      failWith(offline),
      failWith(offline),
      answer({ kind: "location", fields: { name: "Sala gessi" } })
    );
    const { pipeline } = setup(client);

    await pipeline.startTask("location");
    await pipeline.submitTranscript("la stanza si chiama sala gessi");

    assert.deepEqual(
      client.calls.map((call) => call.attempt),
      [1, 2, 3]
    );
    assert.equal(extracted(pipeline.state.value).task.fields.name, "Sala gessi");
  });

  it("keeps the transcript and the collected values after a final failure", async () => {
    const offline = new ExtractionError("network", "offline");
    const client = new ScriptedExtractor(
      failWith(offline),
      failWith(offline),
      answer({ kind: "location", fields: { floor: "P2" } })
    );
    const { pipeline } = setup(client, { config: { maxRetries: 1 } });

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    await pipeline.submitTranscript("si trova al secondo piano");

    assert.deepEqual(pipeline.state.value, {
      status: "error",
      kind: "network",
      message: "offline",
      retryable: true,
      transcript: "si trova al secondo piano",
    });
    assert.deepEqual(pipeline.getFieldSnapshot(), { kind: "location", fields: { name: "Sala gessi" } });

    await pipeline.retryLastTranscript();
    assert.equal(client.calls[2]?.transcript, "si trova al secondo piano");
    assert.deepEqual(extracted(pipeline.state.value).task.fields, { name: "Sala gessi", floor: "P2" });
  });

  it("does not retry a content filter refusal", async () => {
    const client = new ScriptedExtractor(failWith(new ExtractionError("content-filtered", "refused")));
    const { pipeline } = setup(client);

    await pipeline.startTask("location");
    await pipeline.submitTranscript("una frase che il modello rifiuta");

    assert.equal(client.calls.length, 1);
    const state = pipeline.state.value;
    assert.equal(state.status === "error" ? state.kind : null, "content-filtered");
  });

  it("rejects transcripts without a task or without content", async () => {
    const { pipeline } = setup(new ScriptedExtractor());

    await pipeline.submitTranscript("pompa in radiologia");
    assert.deepEqual(pipeline.state.value, {
      status: "error",
      kind: "no-active-task",
      message: "Start a task before dictating",
      retryable: false,
      transcript: "pompa in radiologia",
    });

    await pipeline.startTask("location");
    await pipeline.submitTranscript("  \n ");
    assert.deepEqual(pipeline.state.value, {
      status: "error",
      kind: "invalid-input",
      message: "Transcript rejected: empty input",
      retryable: false,
      transcript: null,
    });
  });

  it("applies the local rate limit before calling the model", async () => {
    const client = new ScriptedExtractor(answer({ kind: "location", fields: { name: "Sala gessi" } }));
    const { pipeline } = setup(client, { config: { rateLimitPerMinute: 1 } });

    await pipeline.startTask("location");
    await pipeline.submitTranscript("la stanza si chiama sala gessi");
    await pipeline.submitTranscript("si trova al secondo piano");

    assert.equal(client.calls.length, 1);
    const state = pipeline.state.value;
    assert.equal(state.status, "error");
    if (state.status !== "error") return;
    assert.equal(state.kind, "rate-limited");
    assert.equal(state.retryable, true);
  });

  it("flags low confidence without blocking the update", async () => {
    const client = new ScriptedExtractor(answer({ kind: "location", fields: { name: "Sala gessi" } }, "Ok.", 0.5));
    const { pipeline } = setup(client);

    await pipeline.startTask("location");
    await pipeline.submitTranscript("forse si chiama sala gessi");

    const data = extracted(pipeline.state.value);
    assert.equal(data.lowConfidence, true);
    assert.deepEqual(data.warnings, ["Low confidence (0.50), please check the values"]);
    assert.equal(data.task.fields.name, "Sala gessi");
  });

  it("warns when the record being created may already exist", async () => {
    const { pipeline } = setup(new ScriptedExtractor(), { seed: { locations: [makeLocation("l-1", "Radiologia")] } });

    await pipeline.startTask({ kind: "location", fields: { name: "radiologia" } });

    assert.deepEqual(extracted(pipeline.state.value).warnings, ['A location named "Radiologia" already exists']);
  });

  it("runs one round at a time in submission order", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const client = new ScriptedExtractor(
      async () => {
        await gate;
        return { update: { kind: "location", fields: { name: "Sala gessi" } }, reply: "Ok.", confidence: 0.9, missingFields: [] };
      },
      answer({ kind: "location", fields: { floor: "P0" } })
    );
    const { pipeline } = setup(client);

    await pipeline.startTask("location");
    const first = pipeline.submitTranscript("la stanza si chiama sala gessi");
    const second = pipeline.submitTranscript("si trova al piano terra");
    await sleep(5);
    assert.equal(client.calls.length, 1);

    release();
    await Promise.all([first, second]);
    assert.equal(client.calls.length, 2);
    assert.deepEqual(client.calls[1]?.context.task.fields, { name: "Sala gessi" });
    assert.deepEqual(pipeline.getFieldSnapshot()?.fields, { name: "Sala gessi", floor: "P0" });
  });

  it("aborts the in-flight round and drops queued work on cancel", async () => {
    const client = new ScriptedExtractor(
      (request) =>
        new Promise((_, reject) => {
          request.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const { pipeline, states } = setup(client);

    await pipeline.startTask("location");
    const first = pipeline.submitTranscript("la stanza si chiama sala gessi");
    const second = pipeline.submitTranscript("si trova al piano terra");
    await sleep(5);

    pipeline.cancel("Stopped");
    await Promise.all([first, second]);

    assert.equal(client.calls.length, 1);
    assert.equal(client.calls[0]?.signal?.aborted, true);
    assert.deepEqual(pipeline.state.value, { status: "idle", message: "Stopped" });
    assert.ok(states.every((state) => state.status !== "error"));
  });

  it("uses the presentation layer's values, including manual edits", async () => {
    const client = new ScriptedExtractor(answer({ kind: "location", fields: { department: "Ortopedia" } }));
    const { pipeline } = setup(client);

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gesi" } });
    pipeline.setFieldSnapshotProvider(() => ({ kind: "location", fields: { name: "Sala gessi", floor: "P0" } }));
    await pipeline.submitTranscript("appartiene al reparto di ortopedia");

    assert.deepEqual(client.calls[0]?.context.task.fields, { name: "Sala gessi", floor: "P0" });
    assert.deepEqual(pipeline.getFieldSnapshot()?.fields, { name: "Sala gessi", floor: "P0", department: "Ortopedia" });
  });

  it("refuses to confirm an incomplete task", async () => {
    const { pipeline, repository } = setup(new ScriptedExtractor());

    await pipeline.startTask("location");
    await assert.rejects(pipeline.confirm(), { message: "Task is not complete, missing: name" });
    assert.deepEqual(await repository.listActive("location"), []);
  });

  it("blocks saving until the serviced equipment exists, then creates it inline", async () => {
    const { pipeline, repository } = setup(new ScriptedExtractor());

    await pipeline.startTask({
      kind: "maintenance",
      fields: { equipment: "Ecografo portatile", type: "inspection", description: "Verifica sonde", performedBy: "Mario Rossi" },
    });
    assert.deepEqual(extracted(pipeline.state.value).warnings, ['No equipment matches "Ecografo portatile"']);

    await assert.rejects(pipeline.confirm(), {
      message: '"Ecografo portatile" does not match a single equipment; choose one or create it',
    });

    const equipmentId = await pipeline.createMissingReference("equipment");
    assert.equal(repository.findById("equipment", equipmentId)?.needsCompletion, true);

    await pipeline.confirm();
    const [event] = repository.listMaintenance(equipmentId);
    assert.equal(event?.performedBy, "Mario Rossi");
    assert.equal(event?.type, "inspection");
    assert.equal(repository.findById("equipment", equipmentId)?.lastMaintenanceDate, "2026-03-14");
  });

  it("keeps the task open with its values when saving fails", async () => {
    class FlakyRepository extends InMemoryInventoryRepository {
      failing = true;

      async insert(record: RecordDraft): Promise<string> {
        if (this.failing) {
          throw new Error("disk full");
        }
        return super.insert(record);
      }
    }
    const repository = new FlakyRepository();
    const { pipeline } = setup(new ScriptedExtractor(), { repository });

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    const failure = await pipeline.confirm().then(
      () => null,
      (error: unknown) => error
    );

    assert.ok(failure instanceof PersistenceError);
    assert.equal(failure.message, "disk full");
    assert.ok(failure.cause instanceof Error);
    assert.deepEqual(pipeline.state.value, {
      status: "error",
      kind: "persistence",
      message: "disk full",
      retryable: true,
      transcript: null,
    });
    assert.deepEqual(pipeline.getFieldSnapshot(), { kind: "location", fields: { name: "Sala gessi" } });

    repository.failing = false;
    const id = await pipeline.confirm();
    assert.equal(repository.findById("location", id)?.name, "Sala gessi");
  });

  it("leaves a task started during a save untouched", async () => {
    const repository = new GatedRepository();
    const { pipeline } = setup(new ScriptedExtractor(), { repository });

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    repository.gateInserts = true;
    const saving = pipeline.confirm();
    await repository.arrived.promise;

    const next = pipeline.startTask("vendor");
    repository.gate.resolve();
    const id = await saving;
    await next;

    assert.equal(repository.findById("location", id)?.name, "Sala gessi");
    assert.deepEqual(pipeline.getFieldSnapshot(), { kind: "vendor", fields: {} });
    assert.deepEqual(extracted(pipeline.state.value).task, { kind: "vendor", fields: {} });
  });

  it("keeps the cancel message when a save finishes after it", async () => {
    const repository = new GatedRepository();
    const { pipeline, spoken } = setup(new ScriptedExtractor(), { repository });

    await pipeline.startTask({ kind: "location", fields: { name: "Sala gessi" } });
    repository.gateInserts = true;
    const saving = pipeline.confirm();
    await repository.arrived.promise;

    pipeline.cancel("Stopped");
    repository.gate.resolve();
    await saving;

    assert.deepEqual(pipeline.state.value, { status: "idle", message: "Stopped" });
    assert.deepEqual(spoken, []);
  });

  it("drops lookups of a cancelled round instead of adding them to the next task", async () => {
    const repository = new GatedRepository({ locations: [makeLocation("l-1", "Radiologia")] });
    const client = new ScriptedExtractor(answer({ kind: "equipment", fields: { location: "Radiologia" } }));
    const { pipeline, spoken } = setup(client, { repository });

    await pipeline.startTask("equipment");
    repository.gatedKind = "location";
    const round = pipeline.submitTranscript("la pompa nuova si trova in radiologia");
    await repository.arrived.promise;

    pipeline.cancel("Stopped");
    repository.gatedKind = null;
    const next = pipeline.startTask("location");
    repository.gate.resolve();
    await Promise.all([round, next]);

    const data = extracted(pipeline.state.value);
    assert.deepEqual(data.task, { kind: "location", fields: {} });
    assert.deepEqual(data.references, {});
    assert.deepEqual(data.warnings, []);
    assert.deepEqual(spoken, []);
  });

  it("refuses work after dispose", async () => {
    const { pipeline } = setup(new ScriptedExtractor());
    pipeline.dispose();
    assert.throws(() => pipeline.submitTranscript("pompa in radiologia"), {
      message: "ExtractionPipeline has been disposed",
    });
  });
});
