/**
 * Stream Encoder
 *
 * Pure function of (tree, variant): the header comes from the variant, the
 * body from that variant's layout.
 */

import type { SymbolTable } from '../symbols/index.js';
import type { AtomTree, EncodedStream, Variant } from '../types.js';
import { concatBytes } from './bytes.js';
import { debugLayout } from './debug.js';
import { headerFor } from './detect.js';
import type { LayoutStrategy } from './layout.js';
import { compactLayout } from './production.js';

export interface LayoutOptions {
  /** Replaces the Debug layout */
  debug?: LayoutStrategy;
  /** Replaces the default Production strategy */
  production?: LayoutStrategy;
}

/**
 * Pick the layout for a variant, honouring overrides
 */
export function layoutFor(variant: Variant, options: LayoutOptions = {}): LayoutStrategy {
  const layout = variant === 'debug' ? options.debug ?? debugLayout : options.production ?? compactLayout;
  if (layout.variant !== variant) {
    throw new TypeError(`layout "${layout.name}" produces ${layout.variant} streams, not ${variant}`);
  }
  return layout;
}

export function encode(
  tree: AtomTree,
  variant: Variant,
  symbols: SymbolTable,
  options: LayoutOptions = {}
): EncodedStream {
  const layout = layoutFor(variant, options);
  return {
    variant,
    header: headerFor(variant),
    body: layout.encodeBody(tree, symbols),
  };
}

/**
 * Header and body as one buffer
 */
export function streamBytes(stream: EncodedStream): Uint8Array {
  return concatBytes(stream.header, stream.body);
}
