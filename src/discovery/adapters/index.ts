import type { FrameworkAdapter } from '../types.js';
import { DjangoAdapter } from './django.js';
import { ExpressAdapter } from './express.js';
import { FastApiAdapter } from './fastapi.js';
import { FlaskAdapter } from './flask.js';

/** Registry order breaks confidence ties between adapters that read the same files. */
export function createDefaultAdapters(): FrameworkAdapter[] {
  return [new FlaskAdapter(), new FastApiAdapter(), new DjangoAdapter(), new ExpressAdapter()];
}

export { DjangoAdapter, ExpressAdapter, FastApiAdapter, FlaskAdapter };
export { PatternAdapter, hasExtension } from './base.js';
export type { DetectionSignal } from './base.js';
