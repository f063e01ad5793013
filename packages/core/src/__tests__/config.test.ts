import { assert, describe, test } from "@kubenav/testkit";
import { DEFAULT_NAVIGATOR_CONFIG, resolveNavigatorConfig } from "../config.js";
import { KubenavError, describeError } from "../errors.js";

function isInvalidProps(error: unknown): boolean {
  return error instanceof KubenavError && error.code === "KNAV_INVALID_PROPS";
}

describe("resolveNavigatorConfig", () => {
  test("returns the defaults when nothing is given", () => {
    assert.equal(resolveNavigatorConfig(undefined), DEFAULT_NAVIGATOR_CONFIG);
    assert.deepEqual(resolveNavigatorConfig({}), DEFAULT_NAVIGATOR_CONFIG);
  });

  test("applies overrides and trims the root page name", () => {
    const config = resolveNavigatorConfig({
      rootPage: "  api-resources ",
      statusDismissMs: 0,
      dialogSize: { width: 50, height: 10 },
    });
    assert.equal(config.rootPage, "api-resources");
    assert.equal(config.statusDismissMs, 0);
    assert.deepEqual(config.dialogSize, { width: 50, height: 10 });
    assert.deepEqual(config.menuSize, { width: 60, height: 15 });
    assert.deepEqual(config.statusSize, { width: 100, height: 5 });
  });

  test("rejects invalid values", () => {
    assert.throws(() => resolveNavigatorConfig({ rootPage: "  " }), isInvalidProps);
    assert.throws(() => resolveNavigatorConfig({ statusDismissMs: -1 }), isInvalidProps);
    assert.throws(() => resolveNavigatorConfig({ statusDismissMs: 1.5 }), isInvalidProps);
    assert.throws(() => resolveNavigatorConfig({ menuSize: { width: 0, height: 15 } }), /menuSize.width/);
  });
});

describe("errors", () => {
  test("KubenavError carries its code", () => {
    const error = new KubenavError("KNAV_PARSE_ERROR", "bad header");
    assert.equal(error.name, "KubenavError");
    assert.equal(error.code, "KNAV_PARSE_ERROR");
    assert.equal(error.message, "bad header");
    assert.equal(new KubenavError("KNAV_INVALID_STATE").message, "KNAV_INVALID_STATE");
  });

  test("describeError handles non-Error values", () => {
    assert.equal(describeError(new Error("x")), "x");
    assert.equal(describeError("plain"), "plain");
    assert.equal(describeError(42), "42");
  });
});
