// src/main.ts
import { readFileSync } from "node:fs";
import {
  simulateRentVsBuy,
  upgradeParameters,
  InvalidParameterError,
} from "./domain/rentVsBuy";
import { buildReport } from "./report";

// Usage: npm start [path/to/params.json]
// Fields missing from the file fall back to the defaults.
function loadParameters(path: string | undefined) {
  if (!path) return upgradeParameters(undefined);
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return upgradeParameters(raw);
}

try {
  const result = simulateRentVsBuy(loadParameters(process.argv[2]));
  for (const line of buildReport(result)) {
    console.log(line);
  }
} catch (err) {
  if (err instanceof InvalidParameterError) {
    console.error(`Invalid parameter: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
