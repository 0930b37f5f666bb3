/**
 * Static HTML analysis of a rendered page
 * Finds form controls, event-handler attributes, inline scripts, risky links
 * and raw markup patterns commonly used as XSS vectors
 */

import * as cheerio from 'cheerio';
import { getLogger } from '../utils/logger.js';
import type {
  EventHandlerInfo,
  FormFieldInfo,
  FormInfo,
  HtmlAnalysis,
  InlineScriptInfo,
  InputInfo,
  LinkInfo,
  OptionInfo,
  PatternMatch,
} from './types.js';

export const EVENT_ATTRIBUTES: readonly string[] = [
  'onload', 'onerror', 'onclick', 'onmouseover', 'onmouseout',
  'onkeypress', 'onkeydown', 'onkeyup', 'onchange', 'onfocus',
  'onblur', 'onsubmit', 'onreset', 'ondblclick', 'oncontextmenu',
  'ondrag', 'ondrop', 'onmousedown', 'onmouseup', 'onpaste',
  'oncut', 'oncopy', 'onselect', 'onready', 'onunload',
];

/** Raw markup patterns, matched case-insensitively across lines */
export const HTML_XSS_PATTERNS: readonly string[] = [
  String.raw`<script[^>]*>.*?</script>`,
  String.raw`javascript:.*?['"\s>]`,
  String.raw`\bon\w+\s*=\s*(["']).*?\1`,
  String.raw`data:.*?base64`,
  String.raw`src\s*=\s*(["'])[^"']*?javascript:.*?\1`,
  String.raw`href\s*=\s*(["'])[^"']*?javascript:.*?\1`,
  String.raw`style\s*=\s*(["'])[^"']*?expression\s*\(.*?\1`,
  String.raw`<\w+[^>]*\sformaction\s*=`,
  String.raw`<meta[^>]*\scontent\s*=\s*(["'])[^"']*?url\s*=\s*javascript:.*?\1`,
];

/** JS constructs flagged inside inline <script> blocks */
const INLINE_JS_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/document\.write\s*\(/gi, 'document.write()'],
  [/\beval\s*\(/gi, 'eval()'],
  [/\bsetTimeout\s*\(/gi, 'setTimeout()'],
  [/\bsetInterval\s*\(/gi, 'setInterval()'],
  [/new\s+Function\s*\(/gi, 'new Function()'],
  [/innerHTML\s*=/gi, 'innerHTML assignment'],
  [/outerHTML\s*=/gi, 'outerHTML assignment'],
  [/document\.cookie/gi, 'Cookie access/manipulation'],
  [/document\.domain\s*=/gi, 'document.domain assignment'],
  [/document\.location\s*=/gi, 'document.location assignment'],
  [/window\.location\s*=/gi, 'window.location assignment'],
  [/location\.href\s*=/gi, 'location.href assignment'],
  [/location\.replace\s*\(/gi, 'location.replace()'],
  [/\bparent\./gi, 'Parent frame access'],
  [/\btop\./gi, 'Top frame access'],
  [/fromCharCode/gi, 'String.fromCharCode (possible obfuscation)'],
  [/decodeURI\(/gi, 'decodeURI (possible obfuscation)'],
  [/\batob\(/gi, 'atob (possible obfuscation)'],
  [/execScript\(/gi, 'execScript (possible dangerous execution)'],
];

const SUSPICIOUS_PARAM_MARKERS = ['<script', 'javascript:', 'onerror=', 'onload='];
const SUBMIT_INPUT_TYPES = ['submit', 'image', 'button'];
const MATCH_LIMIT = 100;
const CONTEXT_SIZE = 30;

function isEventAttribute(name: string): boolean {
  return EVENT_ATTRIBUTES.includes(name.toLowerCase());
}

function pick(attrs: Record<string, string>, exclude: string[]): Record<string, string> {
  const rest: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (!exclude.includes(key)) rest[key] = value;
  }
  return rest;
}

/**
 * Text around a position, with <HERE> marking the position
 * and "..." on each side that was cut
 */
export function getContext(text: string, position: number, contextSize: number = CONTEXT_SIZE): string {
  const start = Math.max(0, position - contextSize);
  const end = Math.min(text.length, position + contextSize);
  const prefix = start > 0 ? '...' : '';
  const suffix = end < text.length ? '...' : '';
  return `${prefix}${text.slice(start, position)}<HERE>${text.slice(position, end)}${suffix}`;
}

export function truncate(text: string, limit: number = MATCH_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export class HtmlAnalyzer {
  /**
   * Analyze rendered HTML. A failure in one section leaves the others intact.
   */
  public parse(html: string, url: string | null = null): HtmlAnalysis {
    const logger = getLogger();
    const results: HtmlAnalysis = {
      baseUrl: url,
      inputs: [],
      forms: [],
      eventHandlers: [],
      inlineScripts: [],
      suspiciousPatterns: [],
      links: [],
    };

    try {
      const $ = cheerio.load(html);

      results.inputs = this.analyzeInputs($);
      results.forms = this.analyzeForms($);
      results.eventHandlers = this.analyzeEventHandlers($);
      results.inlineScripts = this.analyzeInlineScripts($);
      results.suspiciousPatterns = this.findSuspiciousPatterns(html);
      results.links = this.analyzeLinks($, url);

      logger.debug(
        `HTML analysis${url ? ` of ${url}` : ''}: ${results.inputs.length} inputs, ` +
          `${results.forms.length} forms, ${results.eventHandlers.length} event handlers, ` +
          `${results.inlineScripts.length} inline scripts, ` +
          `${results.suspiciousPatterns.length} suspicious patterns`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`HTML analysis failed${url ? ` for ${url}` : ''}: ${message}`);
    }

    return results;
  }

  private analyzeInputs($: cheerio.CheerioAPI): InputInfo[] {
    const inputs: InputInfo[] = [];

    $('input').each((_, el) => {
      const attrs = $(el).attr() ?? {};
      const info: InputInfo = {
        tag: 'input',
        type: attrs.type ?? 'text',
        name: attrs.name ?? '',
        id: attrs.id ?? '',
        value: attrs.value ?? '',
        attributes: pick(attrs, ['type', 'name', 'id', 'value']),
        inForm: $(el).closest('form').length > 0,
        suspicious: false,
      };

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          info.suspicious = true;
          info.xssVector = `Event handler: ${attr}=${value}`;
        }
        if (value.toLowerCase().includes('javascript:')) {
          info.suspicious = true;
          info.xssVector = `JavaScript in attribute: ${attr}=${value}`;
        }
      }

      inputs.push(info);
    });

    $('textarea').each((_, el) => {
      const attrs = $(el).attr() ?? {};
      const info: InputInfo = {
        tag: 'textarea',
        type: 'textarea',
        name: attrs.name ?? '',
        id: attrs.id ?? '',
        value: $(el).text(),
        attributes: pick(attrs, ['name', 'id']),
        inForm: $(el).closest('form').length > 0,
        suspicious: false,
      };

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          info.suspicious = true;
          info.xssVector = `Event handler: ${attr}=${value}`;
        }
      }

      inputs.push(info);
    });

    $('select').each((_, el) => {
      const attrs = $(el).attr() ?? {};
      const options: OptionInfo[] = [];
      const info: InputInfo = {
        tag: 'select',
        type: 'select',
        name: attrs.name ?? '',
        id: attrs.id ?? '',
        value: '',
        attributes: pick(attrs, ['name', 'id']),
        options,
        inForm: $(el).closest('form').length > 0,
        suspicious: false,
      };

      $(el)
        .find('option')
        .each((__, opt) => {
          const option: OptionInfo = {
            value: $(opt).attr('value') ?? '',
            text: $(opt).text(),
            selected: $(opt).attr('selected') !== undefined,
          };
          options.push(option);

          if (option.value.toLowerCase().includes('javascript:')) {
            info.suspicious = true;
            info.xssVector = `JavaScript in option value: ${option.value}`;
          }
        });

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          info.suspicious = true;
          info.xssVector = `Event handler: ${attr}=${value}`;
        }
      }

      inputs.push(info);
    });

    return inputs;
  }

  private analyzeForms($: cheerio.CheerioAPI): FormInfo[] {
    const forms: FormInfo[] = [];

    $('form').each((_, el) => {
      const attrs = $(el).attr() ?? {};
      const form: FormInfo = {
        action: attrs.action ?? '',
        method: (attrs.method ?? 'get').toUpperCase(),
        id: attrs.id ?? '',
        name: attrs.name ?? '',
        attributes: pick(attrs, ['action', 'method', 'id', 'name']),
        inputs: [],
        submitButtons: [],
        suspicious: false,
      };

      const action = form.action.toLowerCase();
      if (action.includes('javascript:')) {
        form.suspicious = true;
        form.xssVector = `JavaScript in action: ${action}`;
      }

      $(el)
        .find('input, textarea, select')
        .each((__, field) => {
          const $field = $(field);
          const tag = field.tagName.toLowerCase();
          const type = tag === 'input' ? ($field.attr('type') ?? 'text') : tag;
          const entry: FormFieldInfo = {
            type,
            name: $field.attr('name') ?? '',
            id: $field.attr('id') ?? '',
            value: tag === 'textarea' ? $field.text() : ($field.attr('value') ?? ''),
          };

          if (tag === 'input' && SUBMIT_INPUT_TYPES.includes(type)) {
            form.submitButtons.push(entry);
          } else {
            form.inputs.push(entry);
          }
        });

      $(el)
        .find('button')
        .each((__, button) => {
          const $button = $(button);
          form.submitButtons.push({
            type: $button.attr('type') ?? 'submit',
            value: $button.text().trim(),
            name: $button.attr('name') ?? '',
            id: $button.attr('id') ?? '',
          });
        });

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          form.suspicious = true;
          form.xssVector = `Event handler: ${attr}=${value}`;
        }
      }

      forms.push(form);
    });

    return forms;
  }

  private analyzeEventHandlers($: cheerio.CheerioAPI): EventHandlerInfo[] {
    const eventHandlers: EventHandlerInfo[] = [];

    $('*').each((_, el) => {
      if (!('tagName' in el)) return;
      const $el = $(el);
      const attrs = $el.attr() ?? {};
      const handlers: Record<string, string> = {};

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          handlers[attr] = value;
        }
      }

      if (Object.keys(handlers).length === 0) return;

      eventHandlers.push({
        tagName: el.tagName.toLowerCase(),
        id: attrs.id ?? '',
        className: (attrs.class ?? '').trim().split(/\s+/).filter(Boolean).join(' '),
        handlers,
        contentPreview: $el.children().length === 0 ? $el.text().slice(0, 50) : '',
      });
    });

    return eventHandlers;
  }

  private analyzeInlineScripts($: cheerio.CheerioAPI): InlineScriptInfo[] {
    const inlineScripts: InlineScriptInfo[] = [];

    $('script').each((index, el) => {
      const $el = $(el);
      if ($el.attr('src') !== undefined) return;

      const attrs = pick($el.attr() ?? {}, ['src']);
      const content = $el.text();
      const script: InlineScriptInfo = {
        id: `inline_script_${index}`,
        content,
        attributes: attrs,
        suspicious: false,
        suspiciousPatterns: [],
      };

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          script.suspicious = true;
          script.suspiciousPatterns.push(`Event handler in script tag: ${attr}=${value}`);
        }
      }

      const jsPatterns = this.findSuspiciousJsPatterns(content);
      if (jsPatterns.length > 0) {
        script.suspicious = true;
        script.suspiciousPatterns.push(...jsPatterns);
      }

      inlineScripts.push(script);
    });

    return inlineScripts;
  }

  /**
   * Scan the raw markup for each pattern in HTML_XSS_PATTERNS
   */
  public findSuspiciousPatterns(html: string): PatternMatch[] {
    const suspicious: PatternMatch[] = [];

    for (const pattern of HTML_XSS_PATTERNS) {
      const regex = new RegExp(pattern, 'gis');
      for (const match of html.matchAll(regex)) {
        const start = match.index ?? 0;
        suspicious.push({
          pattern,
          match: truncate(match[0]),
          position: [start, start + match[0].length],
          context: getContext(html, start),
        });
      }
    }

    return suspicious;
  }

  public findSuspiciousJsPatterns(js: string): string[] {
    const suspicious: string[] = [];

    for (const [regex, description] of INLINE_JS_PATTERNS) {
      for (const match of js.matchAll(regex)) {
        suspicious.push(`Suspicious JS pattern (${description}): ${match[0]}`);
      }
    }

    return suspicious;
  }

  private analyzeLinks($: cheerio.CheerioAPI, baseUrl: string | null): LinkInfo[] {
    const links: LinkInfo[] = [];

    $('a[href]').each((_, el) => {
      const $el = $(el);
      const attrs = $el.attr() ?? {};
      const href = attrs.href ?? '';
      const link: LinkInfo = {
        href,
        text: $el.text().trim().slice(0, 50),
        suspicious: false,
        hasParameters: false,
        parameters: {},
      };

      if (href.toLowerCase().startsWith('javascript:')) {
        link.suspicious = true;
        link.xssVector = `JavaScript URI: ${href.slice(0, 100)}`;
      } else if (href.includes('?')) {
        link.hasParameters = true;
        link.parameters = this.parseQuery(href, baseUrl);

        for (const [param, value] of Object.entries(link.parameters)) {
          const lower = value.toLowerCase();
          if (SUSPICIOUS_PARAM_MARKERS.some((marker) => lower.includes(marker))) {
            link.suspicious = true;
            link.xssVector = `Suspicious parameter: ${param}=${value.slice(0, 100)}`;
          }
        }
      }

      for (const [attr, value] of Object.entries(attrs)) {
        if (isEventAttribute(attr)) {
          link.suspicious = true;
          link.xssVector = `Event handler in link: ${attr}=${value}`;
        }
      }

      if (link.suspicious || link.hasParameters) {
        links.push(link);
      }
    });

    return links;
  }

  /**
   * First value of each query parameter; relative hrefs resolve against the page
   */
  private parseQuery(href: string, baseUrl: string | null): Record<string, string> {
    const params: Record<string, string> = {};
    const base = baseUrl ?? 'http://localhost/';
    if (!URL.canParse(href, base)) return params;

    for (const [key, value] of new URL(href, base).searchParams) {
      if (!(key in params)) params[key] = value;
    }
    return params;
  }
}
