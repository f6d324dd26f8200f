/**
 * Minimal text templating for the task registry.
 *
 * Supports `{{ path }}` substitution (dotted paths, lists joined with ", ")
 * and nestable `{% if expr %} / {% elif expr %} / {% else %} / {% endif %}`
 * blocks, where `expr` is `path` or `not path`. A substitution whose value is
 * absent raises TemplateRenderError; a condition on an absent value is false.
 */

import type { TemplateScope, TemplateValue } from '../types/index.js';
import { ErrorCode, PlannerError, TemplateRenderError } from '../utils/errors.js';

type Condition = { negate: boolean; path: string };

type TemplateNode =
  | { kind: 'text'; text: string }
  | { kind: 'var'; path: string }
  | { kind: 'if'; branches: Array<{ condition: Condition; body: TemplateNode[] }>; otherwise: TemplateNode[] };

interface Cursor {
  tokens: string[];
  index: number;
  templateId: string;
}

type Tag = { keyword: string; argument: string };

const TOKEN_PATTERN = /(\{\{[\s\S]*?\}\}|\{%[\s\S]*?%\})/;
/** A block tag alone on its line consumes the line break */
const STANDALONE_TAG = /^[ \t]*(\{%[^\n]*?%\})[ \t]*\n/gm;

function syntaxError(templateId: string, message: string): PlannerError {
  return new PlannerError(`Template ${templateId}: ${message}`, ErrorCode.TEMPLATE_RENDER_ERROR, {
    details: { templateId },
  });
}

function parseTag(token: string): Tag {
  const inner = token.slice(2, -2).trim();
  const space = inner.search(/\s/);
  return space === -1
    ? { keyword: inner, argument: '' }
    : { keyword: inner.slice(0, space), argument: inner.slice(space + 1).trim() };
}

function parseCondition(argument: string, templateId: string): Condition {
  const match = /^(not\s+)?([A-Za-z_][\w.]*)$/.exec(argument);
  if (!match?.[2]) {
    throw syntaxError(templateId, `unsupported condition "${argument}"`);
  }
  return { negate: Boolean(match[1]), path: match[2] };
}

function parseNodes(cursor: Cursor, stopAt: readonly string[]): { nodes: TemplateNode[]; stop: Tag | null } {
  const nodes: TemplateNode[] = [];

  while (cursor.index < cursor.tokens.length) {
    const token = cursor.tokens[cursor.index++] ?? '';
    if (token === '') continue;

    if (token.startsWith('{{')) {
      const path = token.slice(2, -2).trim();
      if (!path) throw syntaxError(cursor.templateId, 'empty substitution');
      nodes.push({ kind: 'var', path });
      continue;
    }

    if (!token.startsWith('{%')) {
      nodes.push({ kind: 'text', text: token });
      continue;
    }

    const tag = parseTag(token);
    if (stopAt.includes(tag.keyword)) {
      return { nodes, stop: tag };
    }
    if (tag.keyword !== 'if') {
      throw syntaxError(cursor.templateId, `unexpected {% ${tag.keyword} %}`);
    }
    nodes.push(parseIf(cursor, tag));
  }

  return { nodes, stop: null };
}

function parseIf(cursor: Cursor, opening: Tag): TemplateNode {
  const branches: Array<{ condition: Condition; body: TemplateNode[] }> = [];
  let condition = parseCondition(opening.argument, cursor.templateId);

  for (;;) {
    const { nodes, stop } = parseNodes(cursor, ['elif', 'else', 'endif']);
    branches.push({ condition, body: nodes });

    if (stop === null) {
      throw syntaxError(cursor.templateId, 'unclosed {% if %}');
    }
    if (stop.keyword === 'endif') {
      return { kind: 'if', branches, otherwise: [] };
    }
    if (stop.keyword === 'else') {
      const rest = parseNodes(cursor, ['endif']);
      if (rest.stop === null) {
        throw syntaxError(cursor.templateId, 'unclosed {% else %}');
      }
      return { kind: 'if', branches, otherwise: rest.nodes };
    }
    condition = parseCondition(stop.argument, cursor.templateId);
  }
}

function isScope(value: TemplateValue | undefined): value is TemplateScope {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dotted path, or undefined when any segment is missing.
 */
export function lookup(scope: TemplateScope, path: string): TemplateValue | undefined {
  let current: TemplateValue | undefined = scope;
  for (const segment of path.split('.')) {
    if (!isScope(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function isTruthy(value: TemplateValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value !== '';
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'boolean') return value;
  if (isScope(value)) return true;
  return value.length > 0;
}

function formatValue(value: TemplateValue, path: string, templateId: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null) return '';
  if (isScope(value)) {
    throw syntaxError(templateId, `"${path}" is a section, not a value`);
  }
  return value.join(', ');
}

function renderNodes(nodes: TemplateNode[], scope: TemplateScope, templateId: string): string {
  let out = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        out += node.text;
        break;
      case 'var': {
        const value = lookup(scope, node.path);
        if (value === undefined || value === null) {
          throw new TemplateRenderError(templateId, [node.path]);
        }
        out += formatValue(value, node.path, templateId);
        break;
      }
      case 'if': {
        const branch = node.branches.find(
          ({ condition }) => isTruthy(lookup(scope, condition.path)) !== condition.negate
        );
        out += renderNodes(branch ? branch.body : node.otherwise, scope, templateId);
        break;
      }
    }
  }
  return out;
}

/**
 * Render one template string against a variable scope.
 *
 * @throws {TemplateRenderError} When a substituted path is absent
 * @throws {PlannerError} TEMPLATE_RENDER_ERROR on malformed tags
 */
export function renderTemplate(source: string, scope: TemplateScope, templateId = 'inline'): string {
  const cursor: Cursor = {
    tokens: source.replace(STANDALONE_TAG, '$1').split(TOKEN_PATTERN),
    index: 0,
    templateId,
  };
  const { nodes } = parseNodes(cursor, []);
  return renderNodes(nodes, scope, templateId)
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Declared variables that are absent (undefined or null) from the scope.
 */
export function findMissingVariables(variables: readonly string[], scope: TemplateScope): string[] {
  return variables.filter((name) => {
    const value = lookup(scope, name);
    return value === undefined || value === null;
  });
}
