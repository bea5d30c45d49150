/**
 * Skeletal Forms
 *
 * Flattens nested values into bracket-notation form fields, the way
 * browsers encode nested data (`user[address][city]`).
 */

import { appendChild, createElement, setTextContent, textContent } from '../dom/tree.js';
import { querySelectorAll } from '../dom/selector.js';
import type { ElementNode } from '../dom/types.js';
import { entriesOf, isObjectShaped, toText } from './values.js';

const FIELD_TAGS = 'input, textarea, select';

function findFields(form: ElementNode, name: string): ElementNode[] {
  return querySelectorAll(form, FIELD_TAGS).filter(field => field.attributes.get('name') === name);
}

/**
 * Set the value of the control named `name` inside `form`. Creates a
 * hidden input when the form has no such control.
 */
export function setFieldValue(form: ElementNode, name: string, value: string): void {
  const fields = findFields(form, name);

  if (fields.length === 0) {
    appendChild(form, createElement('input', [
      ['type', 'hidden'],
      ['name', name],
      ['value', value]
    ]));
    return;
  }

  for (const field of fields) {
    switch (field.tagName) {
      case 'textarea':
        setTextContent(field, value);
        break;

      case 'select':
        for (const option of querySelectorAll(field, 'option')) {
          const optionValue = option.attributes.get('value') ?? textContent(option);
          if (optionValue === value) {
            option.attributes.set('selected', 'selected');
          } else {
            option.attributes.delete('selected');
          }
        }
        break;

      default: {
        const type = (field.attributes.get('type') ?? 'text').toLowerCase();
        if (type === 'checkbox' || type === 'radio') {
          if ((field.attributes.get('value') ?? 'on') === value) {
            field.attributes.set('checked', 'checked');
          } else {
            field.attributes.delete('checked');
          }
        } else {
          field.attributes.set('value', value);
        }
      }
    }
  }
}

/**
 * Field name for one entry of an object-shaped value: `%` in the parent
 * name is replaced by the key, otherwise the key is appended in brackets.
 */
export function childFieldName(fieldName: string, key: string): string {
  return fieldName.includes('%')
    ? fieldName.split('%').join(key)
    : `${fieldName}[${key}]`;
}

/**
 * Flatten `value` into fields of `form` rooted at `fieldName`.
 *
 * @example
 * populate(form, { a: { b: 1 } }, 'x');
 * // x = "", x[a] = "", x[a][b] = "1"
 */
export function populate(form: ElementNode, value: unknown, fieldName: string): void {
  if (isObjectShaped(value)) {
    setFieldValue(form, fieldName, '');
    for (const [key, child] of entriesOf(value)) {
      populate(form, child, childFieldName(fieldName, toText(key)));
    }
  } else {
    setFieldValue(form, fieldName, toText(value));
  }
}
