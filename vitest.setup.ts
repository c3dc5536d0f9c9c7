/**
 * Vitest Global Setup
 *
 * Keeps HOOKCHAIN_* variables from the developer's shell out of config tests.
 */
import { beforeEach } from "vitest";

const inherited = Object.keys(process.env).filter((key) => key.startsWith("HOOKCHAIN_"));

beforeEach(() => {
  for (const key of inherited) {
    delete process.env[key];
  }
});
