// file: src/MacroEmitter.ts
import { hasArgument } from './ClauseExtractor';
import {
  DataPresentMatch,
  DirectiveMatch,
  EnterDataCreateMatch,
  HostTransferMatch
} from './PragmaPrimitives';

/**
 * Formats a macro call, leaving out empty or absent arguments.
 */
function macroCall(name: string, args: Array<string | undefined>): string {
  return `${name}(${args.filter(hasArgument).join(', ')})`;
}

/**
 * DATA PRESENT: COPYIN or COPY selects the COPY form, IF alone the IF form.
 * Argument order is condition, copyin, copy, then the present list.
 */
export function emitDataPresent(match: DataPresentMatch): string {
  const { present, copyin, copy, condition } = match.clauses;
  if (hasArgument(copyin) || hasArgument(copy)) {
    return macroCall('GPU_DATA_PRESENT_COPY', [condition, copyin, copy, ...present]);
  }
  if (hasArgument(condition)) {
    return macroCall('GPU_DATA_PRESENT_IF', [condition, ...present]);
  }
  return macroCall('GPU_DATA_PRESENT_SIMPLE', present);
}

/**
 * ENTER DATA CREATE: one form per combination of IF and ASYNC.
 */
export function emitEnterDataCreate(match: EnterDataCreateMatch): string {
  const { create, condition, async } = match.clauses;
  if (hasArgument(condition) && hasArgument(async)) {
    return macroCall('GPU_DATA_ALLOC_IF_ASYNC', [condition, async, ...create]);
  }
  if (hasArgument(condition)) {
    return macroCall('GPU_DATA_ALLOC_IF', [condition, ...create]);
  }
  if (hasArgument(async)) {
    return macroCall('GPU_DATA_ALLOC_ASYNC', [async, ...create]);
  }
  return macroCall('GPU_DATA_ALLOC', create);
}

/**
 * UPDATE/DATA HOST. With a condition on UPDATE, ASYNC wins over WAIT when both
 * are given.
 */
export function emitHostTransfer(match: HostTransferMatch): string {
  const { host, wait, async, condition } = match.clauses;
  if (match.directive === 'DATA') {
    return hasArgument(condition)
      ? macroCall('GPU_DATA_HOST_IF', [condition, ...host])
      : macroCall('GPU_DATA_HOST_SIMPLE', host);
  }
  if (hasArgument(condition) && hasArgument(async)) {
    return macroCall('GPU_DATA_UPDATE_HOST_ASYNC_IF', [condition, async, ...host]);
  }
  if (hasArgument(condition) && hasArgument(wait)) {
    return macroCall('GPU_DATA_UPDATE_HOST_WAIT_IF', [condition, wait, ...host]);
  }
  if (hasArgument(condition)) {
    return macroCall('GPU_DATA_UPDATE_HOST_IF', [condition, ...host]);
  }
  return macroCall('GPU_DATA_UPDATE_HOST', host);
}

/**
 * Emits the macro call for a classified directive, without indentation.
 */
export function emitMacro(match: DirectiveMatch): string {
  switch (match.kind) {
    case 'DataPresent':
      return emitDataPresent(match);
    case 'EnterDataCreate':
      return emitEnterDataCreate(match);
    case 'HostTransfer':
      return emitHostTransfer(match);
    default: {
      const unreachable: never = match;
      throw new Error(`Unhandled directive match: ${JSON.stringify(unreachable)}`);
    }
  }
}
