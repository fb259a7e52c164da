import assert from "node:assert/strict";
import { test } from "node:test";

import { DocumentIdRegistry } from "./documentIds";

test("claim returns the preferred id once, then numbered variants", () => {
  const ids = new DocumentIdRegistry(["scan", "scan_2"]);

  assert.equal(ids.claim("scan_part_1"), "scan_part_1");
  assert.equal(ids.claim("scan_part_1"), "scan_part_1_2");
  assert.equal(ids.claim("scan"), "scan_3");
});
