/**
 * Command syntax codec
 *
 * Templates are written the way command references print them:
 *   ipsec ike keepalive use <gateway_id> <switch> [<mode> <interval> [<count>]]
 *   ipsec sa policy <policy_id> <gateway_id> {esp|ah} <encryption> [<hash>]
 *   ipsec ike duration ipsec-sa <gateway_id> <seconds> [bytes=<kbytes>]
 * `{a|b}` lists keyword synonyms (the first is written on serialize), `[ ... ]` is an
 * optional group, and `<name>` binds a parameter, optionally inside a larger token.
 */

import { SpecDefectError } from "./errors";
import { Command, Parameter, ScalarValue, StructuredRecord, SyntaxForm, Variant } from "./types";
import { normalize, scalarEquals } from "./utils";
import { toInteger, tokenPattern } from "./validators";

export type TemplateNode =
  | { kind: "keyword"; words: string[] }
  | { kind: "slot"; param: string; prefix: string; suffix: string }
  | { kind: "optional"; nodes: TemplateNode[] };

export interface CommandTemplate {
  source: string;
  nodes: TemplateNode[];
  params: string[];
}

export interface Binding {
  value: ScalarValue;
  variant?: string;
}

export interface ParsedCommand {
  form: SyntaxForm;
  template: number;
  bindings: Record<string, Binding>;
}

export class TemplateError extends Error {
  constructor(readonly template: string, message: string) {
    super(`${message} in "${template}"`);
    this.name = "TemplateError";
  }
}

const SLOT_PATTERN = /^(.*?)<([A-Za-z_][\w-]*)>(.*)$/;

function lexTemplate(source: string): string[] {
  return source
    .replace(/\[/g, " [ ")
    .replace(/\]/g, " ] ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

/**
 * Compile a template string into nodes
 */
export function compileTemplate(source: string): CommandTemplate {
  const tokens = lexTemplate(source);
  const params: string[] = [];
  const stack: TemplateNode[][] = [[]];

  for (const token of tokens) {
    const current = stack[stack.length - 1];
    if (token === "[") {
      stack.push([]);
      continue;
    }
    if (token === "]") {
      const group = stack.pop();
      if (!group || stack.length === 0) {
        throw new TemplateError(source, "unbalanced ]");
      }
      if (group.length === 0) {
        throw new TemplateError(source, "empty optional group");
      }
      stack[stack.length - 1].push({ kind: "optional", nodes: group });
      continue;
    }

    const slot = token.match(SLOT_PATTERN);
    if (slot) {
      const [, prefix, param, suffix] = slot;
      if (SLOT_PATTERN.test(suffix)) {
        throw new TemplateError(source, `token "${token}" binds more than one parameter`);
      }
      if (params.includes(param)) {
        throw new TemplateError(source, `parameter <${param}> appears twice`);
      }
      params.push(param);
      current.push({ kind: "slot", param, prefix, suffix });
      continue;
    }

    if (token.startsWith("{") && token.endsWith("}")) {
      const words = token.slice(1, -1).split("|").filter((word) => word.length > 0);
      if (words.length === 0) {
        throw new TemplateError(source, "empty keyword alternatives");
      }
      current.push({ kind: "keyword", words });
      continue;
    }

    current.push({ kind: "keyword", words: [token] });
  }

  if (stack.length !== 1) {
    throw new TemplateError(source, "unclosed [");
  }
  if (stack[0].length === 0) {
    throw new TemplateError(source, "empty template");
  }
  return { source, nodes: stack[0], params };
}

type Continuation = (pos: number, bindings: Record<string, Binding>) => Record<string, Binding> | undefined;

function collectSlots(nodes: TemplateNode[], into: string[] = []): string[] {
  for (const node of nodes) {
    if (node.kind === "slot") into.push(node.param);
    if (node.kind === "optional") collectSlots(node.nodes, into);
  }
  return into;
}

function convert(type: Parameter["type"], raw: string): ScalarValue | undefined {
  if (type === "integer") {
    return toInteger(raw);
  }
  return raw;
}

export class CommandCodec {
  private templates: Record<SyntaxForm, CommandTemplate[]>;
  private parameters: Map<string, Parameter>;
  private synonyms: Map<string, string> = new Map();

  constructor(private command: Command) {
    this.parameters = new Map(command.parameters.map((p) => [p.name, p]));
    try {
      this.templates = {
        set: command.syntax.set.map(compileTemplate),
        delete: command.syntax.delete.map(compileTemplate),
      };
    } catch (error) {
      if (error instanceof TemplateError) {
        throw new SpecDefectError(command.name, [{ code: "malformed_template", message: error.message, path: "syntax" }]);
      }
      throw error;
    }

    for (const template of [...this.templates.set, ...this.templates.delete]) {
      this.registerSynonyms(template.nodes);
    }
  }

  private registerSynonyms(nodes: TemplateNode[]): void {
    for (const node of nodes) {
      if (node.kind === "keyword") {
        for (const word of node.words) {
          if (!this.synonyms.has(word)) this.synonyms.set(word, node.words[0]);
        }
      } else if (node.kind === "optional") {
        this.registerSynonyms(node.nodes);
      }
    }
  }

  /**
   * Collapse whitespace and keyword synonyms so equivalent command lines compare equal
   */
  normalizeText(text: string): string {
    return normalize(text)
      .split(" ")
      .map((token) => this.synonyms.get(token) ?? token)
      .join(" ");
  }

  /**
   * Parse one command line against the set forms, then the delete forms
   */
  parse(text: string, form?: SyntaxForm): ParsedCommand | undefined {
    const tokens = normalize(text).split(" ").filter((token) => token.length > 0);
    const forms: SyntaxForm[] = form ? [form] : ["set", "delete"];

    for (const candidate of forms) {
      const templates = this.templates[candidate];
      for (let index = 0; index < templates.length; index += 1) {
        const bindings = this.matchSequence(templates[index].nodes, 0, tokens, 0, {}, true, (pos, found) =>
          pos === tokens.length ? found : undefined
        );
        if (bindings) {
          return { form: candidate, template: index, bindings };
        }
      }
    }
    return undefined;
  }

  private matchSequence(
    nodes: TemplateNode[],
    index: number,
    tokens: string[],
    pos: number,
    bindings: Record<string, Binding>,
    atTail: boolean,
    next: Continuation
  ): Record<string, Binding> | undefined {
    if (index === nodes.length) {
      return next(pos, bindings);
    }

    const node = nodes[index];
    const isLast = atTail && index === nodes.length - 1;

    if (node.kind === "keyword") {
      return node.words.includes(tokens[pos] ?? "")
        ? this.matchSequence(nodes, index + 1, tokens, pos + 1, bindings, atTail, next)
        : undefined;
    }

    if (node.kind === "optional") {
      const taken = this.matchSequence(node.nodes, 0, tokens, pos, bindings, isLast, (p, b) =>
        this.matchSequence(nodes, index + 1, tokens, p, b, atTail, next)
      );
      return taken ?? this.matchSequence(nodes, index + 1, tokens, pos, bindings, atTail, next);
    }

    for (const option of this.consumeSlot(node, tokens, pos, isLast)) {
      const result = this.matchSequence(
        nodes,
        index + 1,
        tokens,
        option.next,
        { ...bindings, [node.param]: option.binding },
        atTail,
        next
      );
      if (result) return result;
    }
    return undefined;
  }

  private consumeSlot(
    slot: Extract<TemplateNode, { kind: "slot" }>,
    tokens: string[],
    pos: number,
    isLast: boolean
  ): { binding: Binding; next: number }[] {
    const parameter = this.parameters.get(slot.param);
    const token = tokens[pos];
    if (!parameter || token === undefined) {
      return [];
    }

    if (parameter.variants && parameter.variants.length > 0) {
      return parameter.variants.flatMap((variant) => this.consumeVariant(variant, tokens, pos, isLast));
    }

    if (!token.startsWith(slot.prefix) || !token.endsWith(slot.suffix) || token.length < slot.prefix.length + slot.suffix.length) {
      return [];
    }
    const inner = token.slice(slot.prefix.length, token.length - slot.suffix.length);

    if (parameter.type === "enum") {
      const members = (parameter.enumValues ?? []).map((m) => m.value);
      return members.includes(inner) ? [{ binding: { value: inner }, next: pos + 1 }] : [];
    }

    if (parameter.type === "string" && isLast && !slot.suffix && !parameter.pattern) {
      const rest = [inner, ...tokens.slice(pos + 1)].join(" ");
      return [{ binding: { value: rest }, next: tokens.length }];
    }

    const pattern = tokenPattern(parameter.type, parameter.pattern);
    if (pattern && !pattern.test(inner)) {
      return [];
    }
    const value = convert(parameter.type, inner);
    return value === undefined ? [] : [{ binding: { value }, next: pos + 1 }];
  }

  private consumeVariant(variant: Variant, tokens: string[], pos: number, isLast: boolean): { binding: Binding; next: number }[] {
    let start = pos;
    if (variant.keyword) {
      if (tokens[pos] !== variant.keyword) return [];
      start = pos + 1;
    }
    const token = tokens[start];
    if (token === undefined) return [];

    if (variant.type === "string" && isLast && !variant.pattern) {
      return [{ binding: { value: tokens.slice(start).join(" "), variant: variant.name }, next: tokens.length }];
    }

    const pattern = tokenPattern(variant.type, variant.pattern);
    if (pattern && !pattern.test(token)) return [];
    if (variant.range) {
      const numeric = toInteger(token);
      if (numeric === undefined || numeric < variant.range.min || numeric > variant.range.max) return [];
    }
    const value = convert(variant.type, token);
    return value === undefined ? [] : [{ binding: { value, variant: variant.name }, next: start + 1 }];
  }

  /**
   * Target-schema field a parameter (or one of its variants) is stored under
   */
  fieldName(parameter: Parameter, variant?: string): string {
    const chosen = variant ? parameter.variants?.find((v) => v.name === variant) : undefined;
    if (chosen?.field) return chosen.field.name;
    if (parameter.field?.kind === "single") return parameter.field.field.name;
    if (parameter.field?.kind === "per-variant" && variant) {
      const first = parameter.field.fields[variant]?.[0];
      if (first) return first.name;
    }
    return parameter.name;
  }

  /**
   * Structured record of a parse result; parameters of the matched template that were
   * left out take their defaults
   */
  toRecord(parsed: ParsedCommand): StructuredRecord {
    const template = this.templates[parsed.form][parsed.template];
    const record: StructuredRecord = {};
    for (const name of template.params) {
      const parameter = this.parameters.get(name);
      if (!parameter) continue;
      const binding = parsed.bindings[name];
      if (binding) {
        record[this.fieldName(parameter, binding.variant)] = binding.value;
      } else if (parameter.default !== undefined) {
        record[this.fieldName(parameter)] = parameter.default;
      }
    }
    return record;
  }

  /**
   * Parameter bindings of a structured record
   */
  fromRecord(record: StructuredRecord): Record<string, Binding> {
    const bindings: Record<string, Binding> = {};
    for (const parameter of this.command.parameters) {
      for (const variant of parameter.variants ?? []) {
        const field = this.fieldName(parameter, variant.name);
        const value = record[field];
        if (value === undefined) continue;
        if (this.variantAccepts(variant, value)) {
          bindings[parameter.name] = { value, variant: variant.name };
          break;
        }
      }
      if (bindings[parameter.name]) continue;

      const value = record[this.fieldName(parameter)];
      if (value !== undefined) {
        bindings[parameter.name] = { value };
      }
    }
    return bindings;
  }

  private variantAccepts(variant: Variant, value: ScalarValue): boolean {
    const text = String(value);
    const pattern = tokenPattern(variant.type, variant.pattern);
    if (pattern && !pattern.test(text)) return false;
    if (variant.range) {
      const numeric = toInteger(text);
      return numeric !== undefined && numeric >= variant.range.min && numeric <= variant.range.max;
    }
    return true;
  }

  /**
   * Render a structured record as command text using the first template of the form
   * that can express every supplied value
   */
  serialize(record: StructuredRecord, form: SyntaxForm = "set"): string | undefined {
    const bindings = this.fromRecord(record);

    for (const template of this.templates[form]) {
      const emitted = new Set<string>();
      const tokens = this.renderSequence(template.nodes, bindings, emitted);
      if (!tokens) continue;

      const missing = Object.entries(bindings).some(([name, binding]) => {
        if (emitted.has(name)) return false;
        const parameter = this.parameters.get(name);
        const isDefault = parameter?.default !== undefined && scalarEquals(parameter.default, binding.value);
        return !(isDefault && template.params.includes(name));
      });
      if (!missing) {
        return tokens.join(" ");
      }
    }
    return undefined;
  }

  private renderSequence(nodes: TemplateNode[], bindings: Record<string, Binding>, emitted: Set<string>): string[] | undefined {
    const out: string[] = [];
    for (const node of nodes) {
      if (node.kind === "keyword") {
        out.push(node.words[0]);
        continue;
      }

      if (node.kind === "optional") {
        if (!this.groupCarriesValue(node.nodes, bindings)) continue;
        const inner = new Set<string>();
        const rendered = this.renderSequence(node.nodes, bindings, inner);
        if (rendered) {
          out.push(...rendered);
          inner.forEach((name) => emitted.add(name));
        }
        continue;
      }

      // a slot ahead of a written value takes its default
      const parameter = this.parameters.get(node.param);
      const binding = bindings[node.param] ?? (parameter?.default !== undefined ? { value: parameter.default } : undefined);
      if (!binding) return undefined;
      const variant = binding.variant ? parameter?.variants?.find((v) => v.name === binding.variant) : undefined;
      if (variant?.keyword) {
        out.push(variant.keyword);
      }
      out.push(`${node.prefix}${String(binding.value)}${node.suffix}`);
      emitted.add(node.param);
    }
    return out;
  }

  /**
   * A group is written only when one of its slots holds a non-default value
   */
  private groupCarriesValue(nodes: TemplateNode[], bindings: Record<string, Binding>): boolean {
    return collectSlots(nodes).some((name) => {
      const binding = bindings[name];
      if (!binding) return false;
      const fallback = this.parameters.get(name)?.default;
      return fallback === undefined || !scalarEquals(fallback, binding.value);
    });
  }
}
