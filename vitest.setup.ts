/**
 * Vitest Global Setup
 *
 * Keeps MDLIVE_* variables from the developer's shell out of config tests.
 */

for (const name of Object.keys(process.env)) {
  if (name.startsWith("MDLIVE_")) {
    delete process.env[name];
  }
}

