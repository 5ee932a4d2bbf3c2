/**
 * Collection element selection: bind a record to the one element of a stored
 * list whose identifying field matches a separately resolved selector.
 */

import type { BindableRecord, CollectionSelection, RecordSchema } from '../types/binding.js';
import type { ConfigStore } from '../store/config-store.js';
import { decodeOnto, findKey } from './decode.js';
import { isPlainRecord } from './introspect.js';
import { getLogger } from './logger.js';
import { mergePrecedence, type PrecedenceOptions } from './merge.js';

/** Identifying field used when a selection names none. */
export const DEFAULT_IDENTIFYING_KEY = 'name';

export interface SelectedElement {
  readonly element: Record<string, unknown>;
  readonly index: number;
}

export interface SelectionResult {
  readonly matched: boolean;
  /** Resolved selector value ('' when the selector key is unset). */
  readonly selector: string;
  /** Position of the matched element; -1 when nothing matched. */
  readonly index: number;
}

/**
 * First map in `collection` whose `identifyingKey` field, compared as a
 * string, equals `selector`. Non-map elements are skipped.
 */
export function selectElement(
  collection: readonly unknown[],
  identifyingKey: string,
  selector: string,
): SelectedElement | undefined {
  for (const [index, element] of collection.entries()) {
    if (!isPlainRecord(element)) continue;
    const key = findKey(element, identifyingKey);
    if (key === undefined) continue;
    const id = element[key];
    if (id === undefined || id === null) continue;
    if (String(id) === selector) {
      return { element, index };
    }
  }
  return undefined;
}

/**
 * Resolve the selector through the store, pick the matching element and
 * decode it onto `target` under the precedence rules.
 *
 * No match is not an error: the target keeps what flag parsing left in it.
 *
 * @throws FlagstackError DECODE_ERROR when the collection is not a list or the element does not fit the record
 */
export function selectAndBind(
  store: ConfigStore,
  selection: CollectionSelection,
  schema: RecordSchema,
  target: BindableRecord,
  precedence: PrecedenceOptions,
): SelectionResult {
  const log = getLogger('select');
  const identifyingKey = selection.identifyingKey ?? DEFAULT_IDENTIFYING_KEY;
  const selector = store.getString(selection.selectorKey);

  if (selector === '') {
    log.debug({ selectorKey: selection.selectorKey }, 'Selector is empty; nothing selected');
    return { matched: false, selector, index: -1 };
  }

  const collection = selection.collection ?? store.getList(selection.collectionKey) ?? [];
  const selected = selectElement(collection, identifyingKey, selector);
  if (!selected) {
    log.debug({ collectionKey: selection.collectionKey, selector }, 'No collection element matches selector');
    return { matched: false, selector, index: -1 };
  }

  const path = `${selection.collectionKey}[${selected.index}]`;
  mergePrecedence(target, (record) => decodeOnto(selected.element, schema, record, path), precedence);
  return { matched: true, selector, index: selected.index };
}
