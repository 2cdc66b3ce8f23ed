/**
 * Splits an HTML page into XRL sections.
 *
 * Sections are picked by class name. Everything that does not use the XRL
 * classes ends up in a computed "legacy" below-section, so plain pages still
 * render.
 */

import escapeHtml from "escape-html";
import { parseHTML } from "linkedom";

export interface XrlDocument {
  title: string;
  /** First XRL-main element only */
  main: string[];
  head: string[];
  /** Remaining XRL-main elements, XRL-below elements, then the legacy wrapper */
  below: string[];
  right: string[];
  left: string[];
  headList: string[];
  footerList: string[];
  styleList: string[];
  scriptList: string[];
}

export const LEGACY_CONTENT_ID = "XRL-computed-legacy";

const ABSOLUTE_URL = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;

/**
 * Resolve `link` against `baseUrl` unless it already names its own scheme or
 * host.
 */
export function fixLink(link: string, baseUrl: string): string {
  if (ABSOLUTE_URL.test(link.trim())) return link;
  try {
    return new URL(link, baseUrl).toString();
  } catch {
    return link;
  }
}

function ensureDocumentShell(html: string): string {
  if (/<html[\s>]/i.test(html)) return html;
  return `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
}

function extractAll(root: ParentNode, selector: string): string[] {
  return Array.from(root.querySelectorAll(selector)).map((element) => {
    const markup = element.outerHTML;
    element.remove();
    return markup;
  });
}

export function buildXrlDocument(html: string, url: string): XrlDocument {
  const { document }: { document: Document } = parseHTML(
    ensureDocumentShell(html)
  );

  const titleElement = document.querySelector("title");
  const originalTitle = titleElement?.textContent?.trim() ?? "";
  const title = originalTitle ? `XRL View - ${originalTitle}` : "XRL View";
  titleElement?.remove();

  // Fix all external resource links before anything moves
  document.querySelectorAll("script, link, img, meta").forEach((tag) => {
    const src = tag.getAttribute("src");
    const href = tag.getAttribute("href");
    const content = tag.getAttribute("content");
    if (src !== null) {
      tag.setAttribute("src", fixLink(src, url));
    } else if (href !== null) {
      tag.setAttribute("href", fixLink(href, url));
    } else if (content && tag.getAttribute("itemprop") === "image") {
      tag.setAttribute("content", fixLink(content, url));
    }
  });

  const body: HTMLElement = document.body ?? document.documentElement;

  // Order matters: a section nested in an earlier one leaves with its parent
  extractAll(body, ".XRL-ignore");
  const head = extractAll(body, ".XRL-head");
  const left = extractAll(body, ".XRL-left");
  const right = extractAll(body, ".XRL-right");
  const mains = extractAll(body, ".XRL-main");
  const belows = extractAll(body, ".XRL-below");

  const footerList = extractAll(body, "footer");
  const scriptList = extractAll(body, "script");

  const styleList: string[] = [];
  const bodyLinks: string[] = [];
  body.querySelectorAll("link").forEach((link) => {
    const rel = (link.getAttribute("rel") ?? "").toLowerCase().split(/\s+/);
    (rel.includes("stylesheet") ? styleList : bodyLinks).push(link.outerHTML);
    link.remove();
  });

  const baseTag = `<base href="${escapeHtml(url)}">`;
  const headChildren = document.head
    ? Array.from(document.head.children)
        .filter((child) => child.tagName.toLowerCase() !== "base")
        .map((child) => child.outerHTML)
    : [];
  const headList = [baseTag, ...headChildren, ...bodyLinks];

  const legacy = `<div class="XRL-below" id="${LEGACY_CONTENT_ID}">${body.innerHTML.trim()}</div>`;

  return {
    title,
    main: mains.slice(0, 1),
    head,
    below: [...mains.slice(1), ...belows, legacy],
    right,
    left,
    headList,
    footerList,
    styleList,
    scriptList,
  };
}
