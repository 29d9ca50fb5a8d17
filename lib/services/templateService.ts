// TEMPLATE SERVICE - Fill the label SVG template with one record's values
//
// Template syntax:
// - {{ key }}                 value; text is XML-escaped, keys ending in _svg are inserted as markup
// - {{#key}} ... {{/key}}     block kept only when the value is a non-empty string or a non-zero number
//
// Layout positions are derived from the label size and the code size only,
// never from the length of the text.

import { promises as fs } from 'fs';
import { AppError, ErrorCodes, isAppError } from '@/lib/utils/errors';
import { escapeXml, fmt, sanitizeSvg } from '@/lib/utils/svg';
import type { CodeResult, LabelDimensions, LabelRecord, SvgFragment } from '@/lib/types/label';

export type TemplateValue = string | number;
export type TemplateValues = Record<string, TemplateValue>;

// ========================================
// PARSING
// ========================================

type TemplateNode =
  | { kind: 'text'; text: string }
  | { kind: 'value'; key: string }
  | { kind: 'section'; key: string; children: TemplateNode[] };

const TAG_PATTERN = /\{\{\s*([#/]?)\s*([A-Za-z_][\w]*)\s*\}\}/g;

function parseTemplate(template: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: Array<{ key: string; children: TemplateNode[] }> = [];
  let current = root;
  let cursor = 0;

  for (const match of template.matchAll(TAG_PATTERN)) {
    const index = match.index ?? 0;
    if (index > cursor) {
      current.push({ kind: 'text', text: template.slice(cursor, index) });
    }
    cursor = index + match[0].length;

    const [, sigil, key] = match;
    if (sigil === '#') {
      const section: { kind: 'section'; key: string; children: TemplateNode[] } = {
        kind: 'section',
        key,
        children: [],
      };
      current.push(section);
      stack.push(section);
      current = section.children;
    } else if (sigil === '/') {
      const open = stack.pop();
      if (!open || open.key !== key) {
        throw new AppError(ErrorCodes.RENDERING_FAILURE, `Unexpected closing tag {{/${key}}}`, { key });
      }
      current = stack.length > 0 ? stack[stack.length - 1].children : root;
    } else {
      current.push({ kind: 'value', key });
    }
  }

  if (stack.length > 0) {
    const open = stack[stack.length - 1].key;
    throw new AppError(ErrorCodes.RENDERING_FAILURE, `Unclosed section {{#${open}}}`, { key: open });
  }

  if (cursor < template.length) {
    current.push({ kind: 'text', text: template.slice(cursor) });
  }
  return root;
}

// ========================================
// RENDERING
// ========================================

function lookup(values: TemplateValues, key: string): TemplateValue {
  const value = values[key];
  if (value === undefined) {
    throw new AppError(ErrorCodes.RENDERING_FAILURE, `Template value missing: ${key}`, { key });
  }
  return value;
}

function isTruthy(value: TemplateValue): boolean {
  return typeof value === 'number' ? value !== 0 : value !== '';
}

function formatValue(key: string, value: TemplateValue): string {
  if (typeof value === 'number') return fmt(value);
  return key.endsWith('_svg') ? value : escapeXml(value);
}

function renderNodes(nodes: TemplateNode[], values: TemplateValues): string {
  let out = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        out += node.text;
        break;
      case 'value':
        out += formatValue(node.key, lookup(values, node.key));
        break;
      case 'section':
        if (isTruthy(lookup(values, node.key))) {
          out += renderNodes(node.children, values);
        }
        break;
    }
  }
  return out;
}

/**
 * Substitute values into a template and sanitise the result
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  const rendered = renderNodes(parseTemplate(template), values);
  try {
    return sanitizeSvg(rendered);
  } catch (error) {
    if (isAppError(error)) {
      throw new AppError(ErrorCodes.RENDERING_FAILURE, `Rendered label is not valid SVG: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Read a template file and check its syntax before any record uses it
 */
export async function loadTemplate(templatePath: string): Promise<string> {
  let template: string;
  try {
    template = await fs.readFile(templatePath, 'utf8');
  } catch (error) {
    throw new AppError(ErrorCodes.NOT_FOUND, `Template file '${templatePath}' could not be read`, {
      path: templatePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  parseTemplate(template);
  return template;
}

// ========================================
// LAYOUT
// ========================================

export interface LabelLayout {
  icon_size: number;
  text_x: number;
  name_y: number;
  description_y: number;
  name_font_size: number;
  description_font_size: number;
  qr_x: number;
  qr_y: number;
}

// Fractions of the label height
const TEXT_GAP_RATIO = 0.1;
const NAME_BASELINE_RATIO = 0.45;
const DESCRIPTION_BASELINE_RATIO = 0.85;
const NAME_FONT_RATIO = 0.4;
const DESCRIPTION_FONT_RATIO = 0.28;

const round3 = (value: number) => Math.round(value * 1000) / 1000;

/**
 * Icon square on the left, two text lines after it, code square flush right and vertically centred
 */
export function computeLabelLayout(dimensions: LabelDimensions, codeSize: number): LabelLayout {
  const { widthMm, heightMm } = dimensions;
  return {
    icon_size: round3(heightMm),
    text_x: round3(heightMm * (1 + TEXT_GAP_RATIO)),
    name_y: round3(heightMm * NAME_BASELINE_RATIO),
    description_y: round3(heightMm * DESCRIPTION_BASELINE_RATIO),
    name_font_size: round3(heightMm * NAME_FONT_RATIO),
    description_font_size: round3(heightMm * DESCRIPTION_FONT_RATIO),
    qr_x: round3(widthMm - codeSize),
    qr_y: round3((heightMm - codeSize) / 2),
  };
}

/**
 * Every value the default template refers to, for one record
 */
export function buildTemplateValues(
  record: LabelRecord,
  iconSvg: SvgFragment,
  code: CodeResult,
  dimensions: LabelDimensions
): TemplateValues {
  return {
    LABEL_WIDTH_MM: dimensions.widthMm,
    LABEL_HEIGHT_MM: dimensions.heightMm,
    name: record.name,
    description: record.description,
    icon_svg: iconSvg,
    qr_svg: code.svg,
    qr_size: code.size,
    ...computeLabelLayout(dimensions, code.size),
  };
}
