import { JSDOM } from "jsdom";

export function loadDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

// Collapsed, trimmed text content; "" for a missing element
export function safeText(el: Element | null | undefined): string {
  return (el?.textContent ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Reads label/value pairs laid out as
 * `<div><strong>Label</strong></div><div>value</div>`.
 */
export function readLabelledFields(root: Element): Map<string, string> {
  const fields = new Map<string, string>();
  for (const label of Array.from(root.querySelectorAll("strong"))) {
    const key = safeText(label).replace(/:$/, "");
    const valueEl = label.closest("div")?.nextElementSibling;
    if (key && valueEl) {
      fields.set(key, safeText(valueEl));
    }
  }
  return fields;
}
