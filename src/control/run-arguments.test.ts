import test from "node:test";
import assert from "node:assert/strict";
import { runonceArguments } from "./run-arguments.js";

test("runonceArguments maps every configured key and joins tags", () => {
  const args = runonceArguments({
    concurrency: 2,
    force: true,
    server: "config.test:123",
    noop: true,
    environment: "staging",
    splay: true,
    splaylimit: 60,
    tag: ["one", "two"],
    ignoreschedules: true,
  });

  assert.deepEqual(args, {
    splaylimit: 60,
    force: true,
    environment: "staging",
    noop: true,
    server: "config.test:123",
    tags: "one,two",
    splay: true,
    ignoreschedules: true,
  });
});

test("runonceArguments omits keys the configuration leaves out", () => {
  assert.deepEqual(runonceArguments({ concurrency: 1 }), {});
});

test("runonceArguments keeps explicit false values", () => {
  assert.deepEqual(runonceArguments({ concurrency: 1, noop: false, splay: false }), {
    noop: false,
    splay: false,
  });
});

test("runonceArguments passes a single tag through unchanged", () => {
  assert.deepEqual(runonceArguments({ concurrency: 1, tag: ["web"] }), { tags: "web" });
});
