import * as cheerio from "cheerio";
import type { AnyNode, Element as CheerioElement } from "domhandler";
import { normalizeWhitespace } from "../utils/shared";

// Elements to always remove (non-content elements)
const REMOVE_ELEMENTS = [
    "script",
    "style",
    "noscript",
    "template",
    "iframe",
    "svg",
    "canvas",
    "img",
    "video",
    "audio",
    "figure",
    "figcaption",
    "button",
    "form",
];

// Boilerplate elements to remove
const BOILERPLATE_ELEMENTS = [
    "nav",
    "footer",
    "aside",
    "header",
];

// Common boilerplate class/id patterns on news pages
const BOILERPLATE_PATTERNS = [
    /nav(igation)?/i,
    /footer/i,
    /sidebar/i,
    /breadcrumb/i,
    /cookie/i,
    /consent/i,
    /advert(isement)?/i,
    /social/i,
    /share/i,
    /comment/i,
    /related/i,
    /recommend/i,
    /newsletter/i,
    /subscribe/i,
    /paywall/i,
    /promo/i,
    /byline/i,
    /caption/i,
];

// Content containers, in order of preference
const CONTENT_SELECTORS = [
    "article",
    "main",
    "[role='main']",
    "[itemprop='articleBody']",
    ".article-body",
    ".article-content",
    ".story-body",
    ".post-content",
    ".entry-content",
];

function isElement(node: AnyNode): node is CheerioElement {
    return node.type === "tag";
}

function isBoilerplateElement(el: CheerioElement): boolean {
    const id = el.attribs["id"] ?? "";
    const className = el.attribs["class"] ?? "";
    const combined = `${id} ${className}`;
    return BOILERPLATE_PATTERNS.some(pattern => pattern.test(combined));
}

/**
 * Strip HTML of scripts, styles, media and boilerplate sections
 * Content containers and their ancestors survive; boilerplate nested inside a
 * container (share bars, captions) is still removed
 */
function stripBoilerplate($: cheerio.CheerioAPI): void {
    for (const selector of REMOVE_ELEMENTS) {
        $(selector).remove();
    }

    const protectedContent = $(CONTENT_SELECTORS.join(", "));
    protectedContent.attr("data-lede-protect", "true");

    for (const selector of BOILERPLATE_ELEMENTS) {
        $(selector).each((_, el) => {
            const $el = $(el);
            if (!$el.attr("data-lede-protect") && $el.find("[data-lede-protect]").length === 0) {
                $el.remove();
            }
        });
    }

    $("*").each((_, el) => {
        if (!isElement(el)) return;
        if (el.tagName === "html" || el.tagName === "body") return;
        const $el = $(el);
        if ($el.attr("data-lede-protect")) return;
        if ($el.find("[data-lede-protect]").length) return;
        if (isBoilerplateElement(el)) {
            $el.remove();
        }
    });

    $("[data-lede-protect]").removeAttr("data-lede-protect");
}

/**
 * Find the article container, falling back to body
 */
function findContent($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> {
    for (const selector of CONTENT_SELECTORS) {
        const $el = $(selector).first();
        if ($el.length > 0 && normalizeWhitespace($el.text()).length > 0) {
            return $el;
        }
    }
    return $("body");
}

/**
 * Extract readable article text from an HTML page: the paragraphs of the main
 * content container joined by spaces. Pages without paragraphs fall back to the
 * container's whole text.
 */
export function htmlToText(html: string): string {
    const $ = cheerio.load(html);
    stripBoilerplate($);

    const $content = findContent($);
    const paragraphs: string[] = [];

    $content.find("p").each((_, el) => {
        const text = normalizeWhitespace($(el).text());
        if (text.length > 0) {
            paragraphs.push(text);
        }
    });

    if (paragraphs.length === 0) {
        return normalizeWhitespace($content.text());
    }

    return paragraphs.join(" ");
}
