import { expect, test } from "vitest"

import { resolveConfig } from "../src/lib/config"
import { ConfigError } from "../src/lib/errors"

test("defaults apply when only the directory is given", () => {
  expect(resolveConfig({ dir: "/home/site/_target" }, {})).toEqual({
    watchDir: "/home/site/_target",
    port: 8000,
    host: undefined,
    maxWaitSeconds: 30,
    verbose: false,
  })
})

test("PORT from the environment is used when no flag is given", () => {
  expect(resolveConfig({ dir: "builds" }, { PORT: "9090" }).port).toBe(9090)
  expect(
    resolveConfig({ dir: "builds", port: "7000" }, { PORT: "9090" }).port,
  ).toBe(7000)
})

test("flags are parsed as whole numbers", () => {
  const config = resolveConfig(
    { dir: "builds", port: "8080", maxWait: "0", host: "127.0.0.1", verbose: true },
    {},
  )

  expect(config).toEqual({
    watchDir: "builds",
    port: 8080,
    host: "127.0.0.1",
    maxWaitSeconds: 0,
    verbose: true,
  })
})

test("invalid values are rejected", () => {
  expect(() => resolveConfig({ dir: "builds", port: "abc" }, {})).toThrow(
    'port must be a whole number, got "abc"',
  )
  expect(() => resolveConfig({ dir: "builds", port: "70000" }, {})).toThrow(
    "port must be between 0 and 65535, got 70000",
  )
  expect(() => resolveConfig({ dir: "builds", maxWait: "-1" }, {})).toThrow(
    'max-wait must be a whole number, got "-1"',
  )
  expect(() => resolveConfig({ dir: "  " }, {})).toThrow(ConfigError)
})
