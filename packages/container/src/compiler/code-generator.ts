/*
 * CodeGenerator
 * -------------
 * Emits JavaScript for analyzed plans and assembles the artifact module.
 *
 * Each compiled entry becomes one expression routine keyed by its id:
 *
 *   "mailer": (di) => ((object) => (
 *     inject(object, "mailer", "Mailer", "retries", 3),
 *     invoke(object, "mailer", "Mailer", "setLogger", [di.get("logger")]),
 *     object
 *   ))(new (classes("Mailer"))(di.get("transport"))),
 *
 * (on one line in the artifact). Constructions stay expressions, so nested
 * ones run exactly where interpreted resolution would run them.
 *
 * References to other entries always go through `di.get`, so they hit the
 * dispatch table and fall back to interpreted resolution. `classes`, `inject`
 * and `invoke` are handed over when the artifact is loaded. Output only
 * depends on the plans and their order.
 */
import type { Literal, PlanNode } from './analyzer.js';

export interface ArtifactIdentity {
  /** Generated class name, also the artifact file name. */
  readonly name: string;
  /** Name of the class the generated one extends. */
  readonly parentName: string;
}

const INDENT = '  ';

const quote = (text: string): string => JSON.stringify(text);

function indent(text: string, depth: number): string {
  const pad = INDENT.repeat(depth);
  return text
    .split('\n')
    .map((line) => (line ? pad + line : line))
    .join('\n');
}

export function literal(value: Literal): string {
  switch (typeof value) {
    case 'string':
      return quote(value);
    case 'number':
      if (Object.is(value, -0)) return '-0';
      return String(value); // NaN, Infinity and -Infinity are globals
    case 'bigint':
      return `${value}n`;
    case 'boolean':
      return String(value);
    case 'undefined':
      return 'undefined';
    default:
      return 'null';
  }
}

/** Property key of an object literal; `__proto__` must stay an own key. */
function recordKey(key: string): string {
  return key === '__proto__' ? `[${quote(key)}]` : quote(key);
}

export class CodeGenerator {
  /**
   * Routine for one entry, as an object-literal member.
   */
  generate(plan: PlanNode, entryId: string): string {
    const expression = this.expression(plan, entryId);
    const body = expression.startsWith('{') ? `(${expression})` : expression;
    return `${recordKey(entryId)}: (di) => ${body},`;
  }

  /**
   * Artifact module holding the routines. It exports a `define(Parent,
   * runtime)` function returning the container class.
   */
  assemble(fragments: readonly string[], identity: ArtifactIdentity): string {
    const name = quote(identity.name);
    const entries =
      fragments.length === 0
        ? `${INDENT.repeat(2)}const entries = Object.freeze({});`
        : [
            `${INDENT.repeat(2)}const entries = Object.freeze({`,
            ...fragments.map((f) => indent(f, 3)),
            `${INDENT.repeat(2)}});`,
          ].join('\n');

    return [
      "'use strict';",
      `// Compiled container ${name}. Generated file, do not edit.`,
      'module.exports = {',
      `${INDENT}name: ${name},`,
      `${INDENT}parent: ${quote(identity.parentName)},`,
      `${INDENT}define(Parent, { classes, inject, invoke }) {`,
      entries,
      // the key names the class without binding its name in scope
      `${INDENT.repeat(2)}const named = {`,
      `${INDENT.repeat(3)}${name}: class extends Parent {`,
      `${INDENT.repeat(4)}static compiledEntries = entries;`,
      `${INDENT.repeat(3)}},`,
      `${INDENT.repeat(2)}};`,
      `${INDENT.repeat(2)}return named[${name}];`,
      `${INDENT}},`,
      '};',
      '',
    ].join('\n');
  }

  private expression(plan: PlanNode, entryId: string): string {
    switch (plan.op) {
      case 'literal':
        return literal(plan.value);
      case 'lookup':
        return `di.get(${quote(plan.id)})`;
      case 'list':
        return `[${plan.items.map((item) => this.expression(item, entryId)).join(', ')}]`;
      case 'record':
        if (plan.entries.length === 0) return '{}';
        return `{ ${plan.entries
          .map(([key, item]) => `${recordKey(key)}: ${this.expression(item, entryId)}`)
          .join(', ')} }`;
      case 'construct':
        return this.construct(plan, entryId);
    }
  }

  /**
   * `new` with its arguments, then properties, then method calls, each
   * evaluated in that order inside one expression.
   */
  private construct(plan: Extract<PlanNode, { op: 'construct' }>, entryId: string): string {
    const args = plan.args.map((arg) => this.expression(arg, entryId)).join(', ');
    const instantiation = `new (classes(${quote(plan.className)}))(${args})`;
    if (plan.properties.length === 0 && plan.calls.length === 0) return instantiation;

    const member = `object, ${quote(entryId)}, ${quote(plan.className)}`;
    const steps = [
      ...plan.properties.map(
        ([name, value]) => `inject(${member}, ${quote(name)}, ${this.expression(value, entryId)})`
      ),
      ...plan.calls.map(([name, callArgs]) => {
        const rendered = callArgs.map((arg) => this.expression(arg, entryId)).join(', ');
        return `invoke(${member}, ${quote(name)}, [${rendered}])`;
      }),
    ];
    return `((object) => (${steps.join(', ')}, object))(${instantiation})`;
  }
}
