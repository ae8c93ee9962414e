#!/usr/bin/env -S node --import tsx
/**
 * hared: consume the configured queue and run a handler script per message.
 *
 * Exit codes: 0 after SIGINT/SIGTERM, 1 when the loop fails, 2 on bad
 * configuration.
 */

import dotenv from "dotenv";
import { runMain } from "../src/index.js";

dotenv.config();

runMain(process.env).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
