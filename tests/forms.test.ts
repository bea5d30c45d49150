/**
 * Form population tests
 */

import { describe, it, expect } from 'vitest';
import { childFieldName, populate, setFieldValue } from '../src/core/forms.js';
import { NodeHandle } from '../src/core/handle.js';
import { parseMarkup } from '../src/dom/parser.js';
import { serialize } from '../src/dom/serialize.js';
import { createElement, isElement } from '../src/dom/tree.js';
import type { ElementNode } from '../src/dom/types.js';

function parseForm(html: string): ElementNode {
  const form = parseMarkup(html).find(isElement);
  if (!form) throw new Error('no form');
  return form;
}

describe('populate', () => {
  it('should flatten nested objects with bracket names, parents first', () => {
    const form = createElement('form');

    populate(form, { a: { b: 1, c: 2 } }, 'x');

    expect(serialize(form)).toBe(
      '<form>' +
      '<input type="hidden" name="x" value="" />' +
      '<input type="hidden" name="x[a]" value="" />' +
      '<input type="hidden" name="x[a][b]" value="1" />' +
      '<input type="hidden" name="x[a][c]" value="2" />' +
      '</form>'
    );
  });

  it('should substitute % in the field name with the key', () => {
    const form = createElement('form');

    populate(form, ['p', 'q'], 'items[%]');

    expect(form.childNodes.filter(isElement).map(input => [
      input.attributes.get('name'),
      input.attributes.get('value')
    ])).toEqual([
      ['items[%]', ''],
      ['items[0]', 'p'],
      ['items[1]', 'q']
    ]);
  });

  it('should treat maps as object-shaped and null as empty text', () => {
    const form = createElement('form');

    populate(form, new Map([['k', null]]), 'm');

    expect(serialize(form)).toBe(
      '<form><input type="hidden" name="m" value="" /><input type="hidden" name="m[k]" value="" /></form>'
    );
  });

  it('should derive child names', () => {
    expect(childFieldName('user', 'name')).toBe('user[name]');
    expect(childFieldName('row_%_id', '3')).toBe('row_3_id');
  });
});

describe('setFieldValue', () => {
  it('should update the controls a form already has', () => {
    const form = parseForm(
      '<form><input name="email"><textarea name="bio">old</textarea>' +
      '<select name="role"><option value="a">A</option><option value="b" selected>B</option></select>' +
      '<input type="checkbox" name="ok" value="yes"></form>'
    );

    setFieldValue(form, 'email', 'e@example.test');
    setFieldValue(form, 'bio', 'new');
    setFieldValue(form, 'role', 'a');
    setFieldValue(form, 'ok', 'yes');

    expect(serialize(form)).toBe(
      '<form><input name="email" value="e@example.test" /><textarea name="bio">new</textarea>' +
      '<select name="role"><option value="a" selected="selected">A</option><option value="b">B</option></select>' +
      '<input type="checkbox" name="ok" value="yes" checked="checked" /></form>'
    );
  });

  it('should match select options by text when they have no value', () => {
    const form = parseForm('<form><select name="size"><option>S</option><option>M</option></select></form>');

    setFieldValue(form, 'size', 'M');

    expect(serialize(form)).toBe(
      '<form><select name="size"><option>S</option><option selected="selected">M</option></select></form>'
    );
  });
});

describe('NodeHandle.populateFrom', () => {
  it('should fill a form from top-level keys', () => {
    const form = parseForm('<form><input name="name"></form>');

    new NodeHandle(form).populateFrom({ name: 'Ada', tags: ['x'] });

    expect(serialize(form)).toBe(
      '<form><input name="name" value="Ada" />' +
      '<input type="hidden" name="tags" value="" />' +
      '<input type="hidden" name="tags[0]" value="x" /></form>'
    );
  });

  it('should do nothing on other elements', () => {
    const div = createElement('div');
    new NodeHandle(div).populateFrom({ a: 1 });
    expect(serialize(div)).toBe('<div></div>');
  });
});
