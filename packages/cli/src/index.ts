#!/usr/bin/env tsx

import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
