import type { StackFrame } from './types.js';

const PYTHON_FRAME = /^\s*File "([^"]+)", line (\d+)(?:, in (\S+))?/;
const NODE_FRAME = /^\s*at (?:(?:async )?(.+?) \()?(?:file:\/\/)?([^()\s]+?):(\d+)(?::\d+)?\)?\s*$/;
const PY_LOCATION = /\(([^(),\s]+\.\w+), line (\d+)\)/;
const COMPILER_LOCATION = /^([^\s:()]+\.[A-Za-z]{1,4})(?::(\d+):\d+|\((\d+),\d+\))/;

const LIBRARY_PATH = /(?:site-packages|dist-packages|node_modules|[\\/]lib[\\/]python\d|<frozen |^node:|^internal[\\/]|^<)/;

export function isLibraryPath(file: string): boolean {
  return LIBRARY_PATH.test(file);
}

function frame(file: string, line: number | undefined, fn: string | undefined): StackFrame {
  const normalized = file.replace(/\\/g, '/');
  return {
    file: normalized,
    ...(line !== undefined ? { line } : {}),
    ...(fn ? { function: fn } : {}),
    isApplicationCode: !isLibraryPath(normalized),
  };
}

/** The `(file, line N)` or `file:line:col` location the error message itself reports. */
export function reportedLocation(text: string): { file: string; line: number } | undefined {
  for (const raw of text.split(/\r?\n/)) {
    const py = raw.match(PY_LOCATION);
    if (py) return { file: py[1], line: Number(py[2]) };
    const compiler = raw.trim().match(COMPILER_LOCATION);
    if (compiler) return { file: compiler[1], line: Number(compiler[2] ?? compiler[3]) };
  }
  return undefined;
}

/**
 * Stack frames, innermost first. Python tracebacks list the innermost frame
 * last and are reversed; V8 traces are already innermost first. A location
 * reported by the message itself leads the list.
 */
export function parseFrames(text: string): StackFrame[] {
  const python: StackFrame[] = [];
  const node: StackFrame[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const py = raw.match(PYTHON_FRAME);
    if (py) {
      python.push(frame(py[1], Number(py[2]), py[3]));
      continue;
    }
    const v8 = raw.match(NODE_FRAME);
    if (v8) node.push(frame(v8[2], Number(v8[3]), v8[1]));
  }

  const frames = [...python.reverse(), ...node];
  const location = reportedLocation(text);
  if (location) {
    const seen = frames.some((f) => f.file === location.file && f.line === location.line);
    if (!seen) frames.unshift(frame(location.file, location.line, undefined));
  }
  return frames;
}

/**
 * First application frame, or the first frame overall when every frame is
 * library code. `fromDependency` marks the second case.
 */
export function selectAnchor(frames: StackFrame[]): { anchor?: StackFrame; fromDependency: boolean } {
  if (frames.length === 0) return { fromDependency: false };
  const app = frames.find((f) => f.isApplicationCode);
  if (app) return { anchor: app, fromDependency: false };
  return { anchor: frames[0], fromDependency: true };
}

/** File identity for fingerprints: the last two path segments, so checkout roots do not matter. */
export function anchorKey(anchor: StackFrame | undefined): string {
  if (!anchor) return '';
  const tail = anchor.file.split('/').filter(Boolean).slice(-2).join('/');
  return `${tail}#${anchor.function ?? ''}`.toLowerCase();
}
