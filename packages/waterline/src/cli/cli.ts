#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { main } from "./main.js";

await main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
