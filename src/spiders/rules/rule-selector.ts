/**
 * Rule selector evaluation
 *
 * Rule syntax:
 * - `selector@attr`: CSS selector plus what to extract (`text`, `html`,
 *   `outerHtml` or any attribute name). `@text` is the default.
 * - `@attr` alone applies to the current element.
 * - `rule##pattern` / `rule##pattern##replacement`: regex replacement on the
 *   extracted value (global). Patterns run on RE2.
 * - `ruleA || ruleB`: alternatives, the first non-empty result wins.
 */

import { compilePattern } from "../../utils/url-helpers.js";

export interface ParsedRule {
  selector: string;
  attr: string;
  replace?: {
    pattern: string;
    replacement: string;
  };
}

/**
 * Anything that can be searched with CSS selectors
 */
export interface RuleRoot {
  querySelectorAll(selector: string): ArrayLike<Element>;
}

const ATTR_SUFFIX = /@([\w-]+)$/;

/**
 * Parse one rule alternative
 */
export function parseRule(rule: string): ParsedRule {
  const [base = "", pattern, replacement] = rule.split("##");
  const trimmed = base.trim();
  const attrMatch = ATTR_SUFFIX.exec(trimmed);

  const parsed: ParsedRule = attrMatch
    ? { selector: trimmed.slice(0, attrMatch.index).trim(), attr: attrMatch[1] ?? "text" }
    : { selector: trimmed, attr: "text" };

  if (pattern !== undefined && pattern !== "") {
    parsed.replace = { pattern, replacement: replacement ?? "" };
  }
  return parsed;
}

/**
 * Split a rule into its alternatives
 */
export function parseRuleAlternatives(rule: string): ParsedRule[] {
  return rule
    .split("||")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseRule);
}

/**
 * Elements matching a selector; invalid selectors match nothing
 */
export function selectAll(root: RuleRoot, selector: string): Element[] {
  if (!selector.trim()) {
    return [];
  }
  try {
    return Array.from(root.querySelectorAll(selector));
  } catch {
    return [];
  }
}

/**
 * Read one attribute kind from an element
 */
export function readAttr(element: Element, attr: string): string {
  switch (attr) {
    case "text":
      return (element.textContent ?? "").replace(/\s+/g, " ").trim();
    case "html":
      return element.innerHTML.trim();
    case "outerHtml":
      return element.outerHTML.trim();
    default:
      return (element.getAttribute(attr) ?? "").trim();
  }
}

function applyReplace(value: string, rule: ParsedRule): string {
  if (!rule.replace) {
    return value;
  }
  const regex = compilePattern(rule.replace.pattern, "g");
  return regex ? value.replace(regex, rule.replace.replacement).trim() : value;
}

/**
 * Every value a single parsed rule yields under an element or document
 */
function evaluate(root: RuleRoot | Element, rule: ParsedRule): string[] {
  let elements: Element[];
  if (rule.selector === "") {
    elements = isElement(root) ? [root] : [];
  } else {
    elements = selectAll(root, rule.selector);
  }
  return elements.map((element) => applyReplace(readAttr(element, rule.attr), rule)).filter((value) => value !== "");
}

/**
 * Extract all values for a rule; the first alternative with results wins
 */
export function extractAll(root: RuleRoot | Element, rule: string | undefined): string[] {
  if (!rule) {
    return [];
  }
  for (const parsed of parseRuleAlternatives(rule)) {
    const values = evaluate(root, parsed);
    if (values.length > 0) {
      return values;
    }
  }
  return [];
}

/**
 * Extract the first value for a rule, or ""
 */
export function extractFirst(root: RuleRoot | Element, rule: string | undefined): string {
  return extractAll(root, rule)[0] ?? "";
}

function isElement(root: RuleRoot | Element): root is Element {
  return "getAttribute" in root;
}
