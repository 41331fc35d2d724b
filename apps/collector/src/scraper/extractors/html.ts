/**
 * Shared DOM helpers for the extractors.
 *
 * "Visible text" is every text node outside script, style, noscript and template
 * subtrees. All returned strings are whitespace-collapsed and trimmed.
 */

import * as cheerio from 'cheerio'
import { hasChildren, isTag, isText } from 'domhandler'
import type { AnyNode } from 'domhandler'

const HIDDEN_TAGS = new Set(['script', 'style', 'noscript', 'template'])

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html)
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

// Explicit stack: page nesting depth is unbounded
function rawTextNodes(nodes: AnyNode[]): string[] {
  const out: string[] = []
  const stack: AnyNode[] = [...nodes].reverse()

  let node = stack.pop()
  while (node !== undefined) {
    if (isText(node)) {
      out.push(node.data)
    } else if (!(isTag(node) && HIDDEN_TAGS.has(node.name.toLowerCase())) && hasChildren(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i]
        if (child !== undefined) stack.push(child)
      }
    }
    node = stack.pop()
  }
  return out
}

/**
 * Cleaned text nodes under the given nodes, in document order.
 */
export function textNodes(nodes: AnyNode[]): string[] {
  return rawTextNodes(nodes)
    .map(cleanText)
    .filter((text) => text.length > 0)
}

/** Whole-document visible text, text nodes joined with spaces */
export function visibleText($: cheerio.CheerioAPI): string {
  return textNodes($.root().toArray()).join(' ')
}

/** Whole-document visible text as non-empty lines; text nodes are newline-separated */
export function visibleLines($: cheerio.CheerioAPI): string[] {
  return rawTextNodes($.root().toArray())
    .join('\n')
    .split(/\r?\n/)
    .map(cleanText)
    .filter((line) => line.length > 0)
}

/** Text of one element, descendant text nodes joined with spaces */
export function elementText(node: AnyNode): string {
  return textNodes([node]).join(' ')
}

/**
 * Cleaned texts of every element matching the selector, empties included.
 */
export function selectTexts($: cheerio.CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map((el) => elementText(el))
}

/**
 * First occurrence wins; stops once `limit` items are kept.
 */
export function dedupe(items: string[], limit = Infinity): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const item of items) {
    if (out.length >= limit) break
    if (seen.has(item)) continue
    seen.add(item)
    out.push(item)
  }
  return out
}

export function lengthBetween(text: string, min: number, max: number): boolean {
  return text.length >= min && text.length <= max
}

/** Case-insensitive substring match against lowercase keywords */
export function containsAny(text: string, keywords: readonly string[]): boolean {
  const low = text.toLowerCase()
  return keywords.some((keyword) => low.includes(keyword))
}
