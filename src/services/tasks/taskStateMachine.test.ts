import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TaskStateMachine } from "./taskStateMachine.js";
import { PersistenceError } from "../../utils/errors.js";

describe("TaskStateMachine", () => {
  it("starts collecting with seeded values", () => {
    const machine = new TaskStateMachine({ kind: "maintenance", fields: { equipment: "Ecografo", cost: null } });
    assert.equal(machine.status, "collecting");
    assert.deepEqual(machine.snapshot(), { kind: "maintenance", fields: { equipment: "Ecografo" } });
  });

  it("hands out copies of the collected values", () => {
    const machine = new TaskStateMachine("location");
    const snapshot = machine.snapshot();
    if (snapshot.kind === "location") snapshot.fields.name = "Changed";
    assert.deepEqual(machine.snapshot(), { kind: "location", fields: {} });
  });

  it("refuses to confirm an incomplete task", async () => {
    const machine = new TaskStateMachine("location");
    await assert.rejects(machine.confirm("unknown", async () => "id"), /missing: name/);
    assert.equal(machine.status, "collecting");
  });

  it("confirms a complete task through the persistence handoff", async () => {
    const machine = new TaskStateMachine({ kind: "location", fields: { name: "Radiologia" } });
    const id = await machine.confirm("unknown", async (task) => {
      assert.equal(machine.status, "confirming");
      assert.deepEqual(task, { kind: "location", fields: { name: "Radiologia" } });
      return "loc-1";
    });
    assert.equal(id, "loc-1");
    assert.equal(machine.status, "confirmed");
    assert.throws(() => machine.apply({ kind: "location", fields: { floor: "P1" } }), /task that is confirmed/);
  });

  it("rolls back to collecting with values intact when persistence fails", async () => {
    const machine = new TaskStateMachine({ kind: "location", fields: { name: "Radiologia", floor: "P1" } });
    const failure = new Error("disk full");

    await assert.rejects(
      machine.confirm("unknown", async () => {
        throw failure;
      }),
      (error: unknown) => error instanceof PersistenceError && error.cause === failure && error.message === "disk full"
    );
    assert.equal(machine.status, "collecting");
    assert.deepEqual(machine.snapshot(), { kind: "location", fields: { name: "Radiologia", floor: "P1" } });
  });

  it("replaces values with a presentation snapshot of the same kind", () => {
    const machine = new TaskStateMachine({ kind: "location", fields: { name: "Radiologia" } });
    machine.replaceFields({ kind: "location", fields: { name: "Radiologia 2", floor: "P2" } });
    assert.equal(machine.summary(), "Name: Radiologia 2\nFloor: P2");
    assert.throws(() => machine.replaceFields({ kind: "vendor", fields: {} }), /Cannot replace a location task/);
  });

  it("abandons, but never un-confirms", async () => {
    const abandoned = new TaskStateMachine("vendor");
    abandoned.abandon();
    assert.equal(abandoned.status, "abandoned");

    const saved = new TaskStateMachine({ kind: "location", fields: { name: "Radiologia" } });
    await saved.confirm("unknown", async () => "id");
    saved.abandon();
    assert.equal(saved.status, "confirmed");
  });
});
