import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { RT_STATUS_ONLINE, RT_STATUS_PAPER } from "../commands.js";
import { decodeOnline, decodePaperStatus } from "../status.js";
import { PAPER_ADEQUATE, PAPER_EMPTY, PAPER_LOW } from "../types.js";
import { loadEscPosStatusFixture } from "./contracts-fixture.js";

const fixture = loadEscPosStatusFixture();

describe("status query selectors", () => {
  it("match the DLE EOT requests", () => {
    const request = (name: string) => fixture.commands.find((c) => c.name === name)?.request;
    assert.deepEqual([...RT_STATUS_ONLINE], request("online"));
    assert.deepEqual([...RT_STATUS_PAPER], request("paper"));
  });
});

describe("decodeOnline", () => {
  it("treats an empty response as offline", () => {
    assert.equal(decodeOnline(new Uint8Array(0)), false);
  });

  it("is online when the offline bit is clear", () => {
    assert.equal(decodeOnline(Uint8Array.of(0x16)), true);
  });

  it("is offline when the offline bit is set", () => {
    assert.equal(decodeOnline(Uint8Array.of(0x1e)), false);
  });

  it("decodes every fixture response", () => {
    for (const entry of fixture.online) {
      assert.equal(
        decodeOnline(Uint8Array.from(entry.response)),
        entry.online,
        `response ${JSON.stringify(entry.response)}`
      );
    }
  });
});

describe("decodePaperStatus", () => {
  it("reports adequate paper when the printer does not answer", () => {
    assert.equal(decodePaperStatus(new Uint8Array(0)), PAPER_ADEQUATE);
  });

  it("distinguishes no paper, low paper and paper present", () => {
    assert.equal(decodePaperStatus(Uint8Array.of(114)), PAPER_EMPTY);
    assert.equal(decodePaperStatus(Uint8Array.of(30)), PAPER_LOW);
    assert.equal(decodePaperStatus(Uint8Array.of(18)), PAPER_ADEQUATE);
  });

  it("defaults to adequate when no mask matches", () => {
    assert.equal(decodePaperStatus(Uint8Array.of(0x00)), PAPER_ADEQUATE);
    assert.equal(decodePaperStatus(Uint8Array.of(0x01)), PAPER_ADEQUATE);
  });

  it("only looks at the first byte", () => {
    assert.equal(decodePaperStatus(Uint8Array.of(18, 114)), PAPER_ADEQUATE);
  });

  it("decodes every fixture response", () => {
    for (const entry of fixture.paper) {
      assert.equal(
        decodePaperStatus(Uint8Array.from(entry.response)),
        entry.status,
        `response ${JSON.stringify(entry.response)}`
      );
    }
  });
});
