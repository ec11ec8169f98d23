// ============================================================================
// CONTAINER READER
// ============================================================================
// Reads the raw text of every configured field from each product container.
// readContainers runs inside the page via page.evaluate, so it must stay
// self-contained: no imports, no module-level helpers.

import type { FieldSelector, ProductField, TargetSelectors } from '../../../shared/types.js';
import { PRODUCT_FIELDS } from '../../../shared/types.js';

export interface FieldQuery {
  field: ProductField;
  css: string;
  /** Read this attribute instead of the text content */
  attribute: string | null;
}

export interface ContainerQuery {
  containerSelector: string;
  fields: FieldQuery[];
}

export interface RawContainer {
  /** Position of the container on the page */
  index: number;
  /** Normalized text per field; null when the node is missing or empty */
  values: Partial<Record<ProductField, string | null>>;
  /** Lookup failures (e.g. an invalid selector) per field */
  failures: Partial<Record<ProductField, string>>;
}

export interface ContainerSnapshot {
  containerCount: number;
  containers: RawContainer[];
}

/**
 * Split a configured selector into its css/attribute parts
 */
export function toFieldQuery(field: ProductField, selector: FieldSelector): FieldQuery {
  if (typeof selector === 'string') {
    return { field, css: selector, attribute: null };
  }
  return { field, css: selector.css, attribute: selector.attribute };
}

export function buildContainerQuery(selectors: TargetSelectors): ContainerQuery {
  return {
    containerSelector: selectors.product_container,
    fields: PRODUCT_FIELDS.map((field) => toFieldQuery(field, selectors[field])),
  };
}

/**
 * Collect raw field values for every container matching the query.
 * `root` defaults to the page document; tests pass a jsdom document.
 */
export function readContainers(query: ContainerQuery, root?: ParentNode): ContainerSnapshot {
  const scope: ParentNode = root ?? document;

  function normalize(text: string | null | undefined): string | null {
    if (!text) return null;
    const trimmed = text.replace(/\s+/g, ' ').trim();
    return trimmed ? trimmed : null;
  }

  // An invalid container selector is a configuration problem, let it throw
  const elements = Array.from(scope.querySelectorAll(query.containerSelector));
  const containers: RawContainer[] = [];

  elements.forEach((container, index) => {
    const values: RawContainer['values'] = {};
    const failures: RawContainer['failures'] = {};

    query.fields.forEach((fieldQuery) => {
      try {
        const el = fieldQuery.css === ':scope' ? container : container.querySelector(fieldQuery.css);
        if (!el) {
          values[fieldQuery.field] = null;
          return;
        }
        values[fieldQuery.field] = fieldQuery.attribute
          ? normalize(el.getAttribute(fieldQuery.attribute))
          : normalize(el.textContent);
      } catch (error) {
        values[fieldQuery.field] = null;
        failures[fieldQuery.field] = error instanceof Error ? error.message : String(error);
      }
    });

    containers.push({ index, values, failures });
  });

  return { containerCount: elements.length, containers };
}
