// file: src/AllocCalls.ts
import { PassResult } from './PragmaPrimitives';
import { parseTempDeclaration } from './TempDeclarations';

// IF (KIND(var) == 8) THEN, or the same after ELSE / ELSEIF
const kindBranchRegex = /^(?:ELSE\s*)?IF\s*\(\s*KIND\s*\(\s*(\w+)\s*\)\s*==\s*\d+\s*\)\s*THEN\b/i;
const endIfRegex = /^END\s*IF\b/i;
// alloc8(...) / alloc4(...); the greedy group runs to the last ')' on the line
const allocCallRegex = /^(\s*alloc[48]\s*)\((.*)\)(.*)$/i;

/**
 * Maps each temp(...) variable in the file (upper-cased) to its full argument form,
 * e.g. `(REAL (KIND=JPRB), ZA, (N, M))`.
 */
export function collectTempDeclarations(lines: string[]): Map<string, string> {
  const temps = new Map<string, string>();
  for (const line of lines) {
    const decl = parseTempDeclaration(line);
    if (!decl) continue;
    const typeSpec = decl.kind ? `${decl.type} (KIND=${decl.kind})` : decl.type;
    temps.set(decl.name.toUpperCase(), `(${typeSpec}, ${decl.name}, (${decl.dimsText}))`);
  }
  return temps;
}

/**
 * Inside `IF (KIND(var) == n) THEN` blocks for a known temp variable, replaces the
 * argument list of alloc8/alloc4 calls with that variable's full temp argument form.
 */
export function updateAllocCalls(lines: string[], temps: Map<string, string>): PassResult {
  const out: string[] = [];
  let current: string | null = null;
  let changed = false;
  for (const line of lines) {
    const stripped = line.trim();
    const branch = kindBranchRegex.exec(stripped);
    if (branch) {
      current = branch[1].toUpperCase();
      out.push(line);
      continue;
    }
    const args = current !== null ? temps.get(current) : undefined;
    if (args !== undefined) {
      const call = allocCallRegex.exec(line);
      if (call) {
        const rewritten = `${call[1]}${args}${call[3]}`;
        if (rewritten !== line) changed = true;
        out.push(rewritten);
        continue;
      }
    }
    if (endIfRegex.test(stripped)) {
      current = null;
    }
    out.push(line);
  }
  return { lines: out, changed };
}

/**
 * Collects temp declarations and expands the alloc calls that refer to them.
 */
export function rewriteAllocCalls(lines: string[]): PassResult {
  return updateAllocCalls(lines, collectTempDeclarations(lines));
}
