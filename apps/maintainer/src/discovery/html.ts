import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstText(scope: cheerio.Cheerio<AnyNode>, selector: string): string {
  return scope.find(selector).first().text().trim()
}

/**
 * Visible text of an anchor, falling back to its title and then its
 * aria-label attribute when the anchor has no text.
 */
export function anchorTitle(anchor: cheerio.Cheerio<AnyNode>): string {
  const text = anchor.text().trim()
  if (text) {
    return text
  }
  return anchor.attr('title')?.trim() || anchor.attr('aria-label')?.trim() || ''
}
