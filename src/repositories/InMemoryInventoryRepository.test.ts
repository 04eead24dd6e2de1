import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { InMemoryInventoryRepository } from "./InMemoryInventoryRepository.js";
import { makeVendor } from "../testing/fixtures.js";

describe("InMemoryInventoryRepository", () => {
  it("lists only active records of a kind", async () => {
    const repository = new InMemoryInventoryRepository({
      vendors: [makeVendor("v1", "Medika Service"), { ...makeVendor("v2", "Old Vendor"), isActive: false }],
    });

    const vendors = await repository.listActive("vendor");
    assert.deepEqual(
      vendors.map((vendor) => vendor.id),
      ["v1"]
    );
  });

  it("creates name-only records flagged as needing completion", async () => {
    const repository = new InMemoryInventoryRepository();
    const id = await repository.create({ kind: "location", name: " Radiologia " });

    const location = repository.findById("location", id);
    assert.equal(location?.name, "Radiologia");
    assert.equal(location?.needsCompletion, true);
    assert.equal(location?.isActive, true);
  });

  it("rejects a blank name", async () => {
    const repository = new InMemoryInventoryRepository();
    await assert.rejects(repository.create({ kind: "vendor", name: "  " }), /without a name/);
  });

  it("inserts and updates maintenance events", async () => {
    const repository = new InMemoryInventoryRepository();
    const id = await repository.insert({
      kind: "maintenance",
      data: {
        equipmentId: "e1",
        vendorId: null,
        type: "repair",
        description: "Replaced fan",
        performedBy: null,
        selfReported: true,
        date: "2026-01-10",
        durationMinutes: null,
        cost: null,
        isWarrantyWork: false,
      },
    });

    const [event] = repository.listMaintenance("e1");
    assert.equal(event.id, id);

    await repository.update({ kind: "maintenance", data: { ...event, cost: 120 } });
    assert.equal(repository.listMaintenance("e1")[0].cost, 120);
  });

  it("fails to update an unknown record", async () => {
    const repository = new InMemoryInventoryRepository();
    await assert.rejects(
      repository.update({ kind: "vendor", data: makeVendor("missing", "Nobody") }),
      /Record missing not found/
    );
  });
});
