import type { LogMode } from "@waterline/core";

/**
 * level : 0 | 1 | 2
 * 0 === default output
 * 1 === --verbose or -v (HTTP request log)
 * 2 === -vv or --debug (engine boundary and store lines)
 */
export function extractVerbosity(args:string[]) {
  let level = 0;
  let debugExplicit = false;
  const rest:string[] = [];

  for(const arg of args) {
    if(arg === "--verbose" || arg === "-v") {
      level += 1;
      continue;
    }

    if(arg === "--debug") {
      debugExplicit = true;
      continue;
    }

    if(/^-v{2,}$/.test(arg)) {
      level += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  return { level, debugExplicit, rest };
}

export function logModeFromVerbosity(level:number, debugExplicit = false, quiet = false): LogMode {
  if (quiet) return 'silent';
  return level >= 2 || debugExplicit ? 'debug' : 'info';
}

/**
 * `undefined` when the flag was not given, so config and defaults can apply.
 */
export function parseOptionalNumberFromCommand(name:string, v:string | undefined, { allowZero = true, integer = false } = {}) {
  if (v === undefined) return undefined;
  const n = Number(v);
  if (v.trim() === '' || !Number.isFinite(n) || n < 0 || (!allowZero && n === 0)) {
    throw new Error(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} number`);
  }
  if (integer && !Number.isInteger(n)) {
    throw new Error(`${name} must be an integer`);
  }
  return n;
}
