import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { AttributeAction, SelectorType, isTraversal, parse } from 'css-what';
import type { Selector } from 'css-what';
import type { Element } from 'domhandler';

export type SelectionScope = CheerioAPI | Cheerio<Element>;

const probe = cheerio.load('');

function findIn(scope: SelectionScope, selector: string): Cheerio<Element> {
  return typeof scope === 'function' ? scope.root().find(selector) : scope.find(selector);
}

function isCompleteToken(token: Selector): boolean {
  switch (token.type) {
    case SelectorType.Tag:
    case SelectorType.PseudoElement:
      return token.name !== '';
    case SelectorType.Attribute:
      // a bare `.` or `#` parses to an empty class or id
      if (token.name === 'class' && token.action === AttributeAction.Element) {
        return token.value !== '';
      }
      if (token.name === 'id' && token.action === AttributeAction.Equals) {
        return token.value !== '';
      }
      return token.name !== '';
    case SelectorType.Pseudo:
      return token.name !== '' && (!Array.isArray(token.data) || isWellFormed(token.data));
    default:
      return true;
  }
}

/** Every group must end on a compound selector, not on a dangling combinator. */
function isWellFormed(groups: Selector[][]): boolean {
  return groups.every(tokens => {
    const last = tokens[tokens.length - 1];
    return last !== undefined && !isTraversal(last) && tokens.every(isCompleteToken);
  });
}

/** Configuration-time check. Strings starting with `<` are markup, not selectors. */
export function isValidSelector(selector: string): boolean {
  const trimmed = selector.trim();
  if (!trimmed || trimmed.startsWith('<')) {
    return false;
  }
  try {
    if (!isWellFormed(parse(trimmed))) {
      return false;
    }
    // unknown pseudo-classes only surface when cheerio compiles the selector
    probe.root().find(trimmed);
    return true;
  } catch {
    return false;
  }
}

/** Ordered matches of `selector` inside `scope`. Empty or malformed selectors match nothing. */
export function select(scope: SelectionScope, selector: string): Cheerio<Element>[] {
  const trimmed = selector.trim();
  if (!trimmed || trimmed.startsWith('<')) {
    return [];
  }
  let matches: Cheerio<Element>;
  try {
    matches = findIn(scope, trimmed);
  } catch {
    // selector syntax is validated up front; anything left over matches nothing
    return [];
  }
  return Array.from({ length: matches.length }, (_unused, index) => matches.eq(index));
}

export function readText(element: Cheerio<Element>): string {
  return element.text().replace(/\s+/g, ' ').trim();
}

export function readAttribute(element: Cheerio<Element>, name: string): string | undefined {
  const value = element.attr(name);
  return value === undefined ? undefined : value.trim();
}
