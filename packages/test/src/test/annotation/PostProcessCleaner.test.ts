/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  importHumanDescriptions,
  NO_GESTURE_SENTENCES,
  PostProcessCleaner,
  scrubUnknown,
} from "@handscribe/annotation";
import { descriptionSchema, InMemoryTableStorage, SlotTable } from "@handscribe/storage";
import { describe, expect, it } from "vitest";

function tableOf(values: Record<string, string>): SlotTable {
  return SlotTable.fromRows(descriptionSchema(), [{ id_video: "v1.", ...values }]);
}

describe("PostProcessCleaner", () => {
  const cleaner = new PostProcessCleaner();

  it("clears blocklisted sentences and drops trailing periods", () => {
    expect(cleaner.cleanValue("No gesture performed.")).toBeNull();
    expect(cleaner.cleanValue("Hand raised.")).toBe("Hand raised");
    expect(cleaner.cleanValue("Wave...")).toBe("Wave");
    expect(cleaner.cleanValue("Thumbs up")).toBe("Thumbs up");
    expect(cleaner.cleanValue("Dr. Pinch gesture")).toBe("Dr. Pinch gesture");
    expect(cleaner.cleanValue(".")).toBeNull();
    expect(cleaner.cleanValue(null)).toBeNull();
  });

  it("matches blocklisted sentences exactly", () => {
    expect(NO_GESTURE_SENTENCES).toHaveLength(8);
    expect(cleaner.cleanValue("No gesture performed")).toBe("No gesture performed");
    expect(cleaner.cleanValue("no gesture performed.")).toBe("no gesture performed");
  });

  it("cleans slot cells only and is idempotent", () => {
    const table = tableOf({
      c1_description: "Hand raised.",
      c2_description: "The user does not perform any gesture.",
      c3_description: "Swipe left",
    });

    const once = cleaner.clean(table);
    expect(once.keys()).toEqual(["v1."]);
    expect(once.getCell("v1.", "c1_description")).toBe("Hand raised");
    expect(once.getCell("v1.", "c2_description")).toBeNull();
    expect(once.getCell("v1.", "c3_description")).toBe("Swipe left");
    expect(cleaner.clean(once).rows()).toEqual(once.rows());
  });

  it("accepts a custom blocklist", () => {
    const custom = new PostProcessCleaner(["Nothing happens."]);
    expect(custom.cleanValue("Nothing happens.")).toBeNull();
    expect(custom.cleanValue("No gesture performed.")).toBe("No gesture performed");
  });
});

describe("human description import", () => {
  it("clears cells marked unknown", () => {
    const table = scrubUnknown(
      tableOf({
        c1_description: "unknown",
        c2_description: "the second gesture is unknown here",
        c3_description: "Two fingers tap the temple",
      })
    );
    expect(table.getCell("v1.", "c1_description")).toBeNull();
    expect(table.getCell("v1.", "c2_description")).toBeNull();
    expect(table.getCell("v1.", "c3_description")).toBe("Two fingers tap the temple");
  });

  it("saves the scrubbed table sorted by identifier", async () => {
    const raw = new InMemoryTableStorage(descriptionSchema(), [
      { id_video: "v2", c1_description: "Swipe left", c2_description: "unknown" },
      { id_video: "v1", c1_description: "Closed fist" },
    ]);
    const target = new InMemoryTableStorage(descriptionSchema());

    const table = await importHumanDescriptions(raw, target);

    expect(table.keys()).toEqual(["v1", "v2"]);
    expect(target.history).toHaveLength(1);
    expect(target.history[0].map((row) => [row.id_video, row.c1_description, row.c2_description])).toEqual([
      ["v1", "Closed fist", null],
      ["v2", "Swipe left", null],
    ]);
  });
});
