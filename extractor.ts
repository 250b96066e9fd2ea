/**
 * Rule-driven entity and relation extraction.
 *
 * Entity rules are declarative specs (vocabulary lists or regex patterns)
 * compiled once into matchers and evaluated in priority order: a match that
 * overlaps a span already claimed by an earlier rule is dropped. Relation
 * templates map a trigger phrase to a label; the subject must be an entity
 * (or a pronoun) immediately before the trigger and the object is the noun
 * phrase that follows it.
 *
 * Pronouns are kept as literal subjects. There is no coreference resolution,
 * so the weaver will usually drop those relations.
 */

import type { EntityRuleSpec, MemoryConfig, RelationTemplateSpec } from "./config.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { getStopWords, normalizeName, snippet } from "./text-utils.js";
import type {
  EntityType,
  ExtractedEntity,
  ExtractedRelation,
  ExtractionResult,
} from "./types.js";

export type RuleMatch = {
  start: number;
  end: number;
  surface: string;
};

export type EntityRule = {
  name: string;
  type: EntityType;
  match(text: string): RuleMatch[];
};

type RelationTemplate = {
  trigger: string;
  label: string;
  inverse: boolean;
  regex: RegExp;
};

type TriggerHit = {
  template: RelationTemplate;
  start: number;
  end: number;
};

type Word = {
  text: string;
  start: number;
  end: number;
};

export type AnalyzerConfig = Pick<MemoryConfig, "entityRules" | "relationTemplates" | "contextWindow">;

const PRONOUNS = new Set(["i", "you", "he", "she", "it", "we", "they", "this", "that", "who"]);
const DETERMINERS = new Set(["a", "an", "the", "new", "his", "her", "their", "its", "our", "my", "your"]);
// "TensorFlow was created by Google": the subject sits before the auxiliary.
const AUXILIARY_TAIL = /(?<!\w)(?:is|was|are|were|has|have|had|been)$/i;
const MAX_OBJECT_WORDS = 4;
const RELATION_CONTEXT_RADIUS = 20;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function withGlobalFlag(flags: string | undefined): string {
  const set = new Set((flags ?? "").split(""));
  set.add("g");
  return [...set].join("");
}

function collectMatches(regex: RegExp, text: string): RuleMatch[] {
  const matches: RuleMatch[] = [];
  for (const m of text.matchAll(regex)) {
    if (m[0].length === 0) continue;
    const start = m.index ?? 0;
    matches.push({ start, end: start + m[0].length, surface: m[0] });
  }
  return matches;
}

/** Build the matcher for one rule spec. Vocabulary terms match on word edges, longest first. */
export function compileEntityRule(spec: EntityRuleSpec): EntityRule {
  let regex: RegExp;
  if (spec.kind === "vocabulary") {
    const alternation = [...spec.terms]
      .sort((a, b) => b.length - a.length)
      .map((term) => escapeRegExp(term).replace(/\s+/g, "\\s+"))
      .join("|");
    regex = new RegExp(`(?<!\\w)(?:${alternation})(?!\\w)`, spec.caseSensitive ? "g" : "gi");
  } else {
    regex = new RegExp(spec.pattern, withGlobalFlag(spec.flags));
  }
  return {
    name: spec.name,
    type: spec.type,
    match: (text) => collectMatches(regex, text),
  };
}

function compileTemplate(spec: RelationTemplateSpec): RelationTemplate {
  const words = spec.trigger.trim().split(/\s+/).map(escapeRegExp);
  return {
    trigger: spec.trigger,
    label: spec.label,
    inverse: spec.inverse ?? false,
    regex: new RegExp(`(?<!\\w)${words.join("\\s+")}(?!\\w)`, "gi"),
  };
}

export class TextAnalyzer {
  private readonly rules: EntityRule[];
  private readonly templates: RelationTemplate[];
  private readonly contextWindow: number;

  constructor(
    config: AnalyzerConfig,
    private readonly logger: Logger = silentLogger,
  ) {
    this.rules = config.entityRules.map(compileEntityRule);
    this.templates = config.relationTemplates.map(compileTemplate);
    this.contextWindow = config.contextWindow;
  }

  extract(text: string): ExtractionResult {
    const spans = this.matchSpans(text);
    return {
      entities: collapseByIdentity(spans),
      relations: this.extractRelations(text, spans),
    };
  }

  extractEntities(text: string): ExtractedEntity[] {
    return collapseByIdentity(this.matchSpans(text));
  }

  /** Every accepted entity occurrence, in text order. */
  private matchSpans(text: string): ExtractedEntity[] {
    const accepted: ExtractedEntity[] = [];
    for (const rule of this.rules) {
      for (const m of rule.match(text)) {
        if (accepted.some((a) => m.start < a.end && a.start < m.end)) continue;
        const normalized = normalizeName(m.surface);
        if (!normalized) continue;
        accepted.push({
          surface: m.surface.trim().replace(/\s+/g, " "),
          normalized,
          type: rule.type,
          start: m.start,
          end: m.end,
          rule: rule.name,
          occurrences: 1,
          context: snippet(text, m.start, m.end, this.contextWindow),
        });
      }
    }
    return accepted.sort((a, b) => a.start - b.start);
  }

  private findTriggers(text: string): TriggerHit[] {
    const hits: TriggerHit[] = [];
    for (const template of this.templates) {
      for (const m of text.matchAll(template.regex)) {
        const start = m.index ?? 0;
        hits.push({ template, start, end: start + m[0].length });
      }
    }
    hits.sort((a, b) => a.start - b.start || b.end - b.start - (a.end - a.start));

    const accepted: TriggerHit[] = [];
    let claimedUntil = 0;
    for (const hit of hits) {
      if (hit.start < claimedUntil) continue;
      accepted.push(hit);
      claimedUntil = hit.end;
    }
    return accepted;
  }

  private extractRelations(text: string, spans: ExtractedEntity[]): ExtractedRelation[] {
    const triggers = this.findTriggers(text);
    const relations: ExtractedRelation[] = [];

    triggers.forEach((hit, index) => {
      const boundary = triggers[index + 1]?.start ?? text.length;
      const subject = findSubject(text, hit.start, spans);
      if (!subject) {
        this.logger.debug?.(
          `memory-graph: skipped "${hit.template.trigger}" at ${hit.start}: no subject entity before trigger`,
        );
        return;
      }
      const phrase = readNounPhrase(text, hit.end, boundary);
      if (phrase.length === 0) {
        this.logger.debug?.(
          `memory-graph: skipped "${hit.template.trigger}" at ${hit.start}: no noun phrase after trigger`,
        );
        return;
      }

      const phraseStart = phrase[0].start;
      const phraseEnd = phrase[phrase.length - 1].end;
      const objectEntity = spans.find((s) => s.start >= phraseStart && s.start < phraseEnd);
      const object = objectEntity?.surface ?? text.slice(phraseStart, phraseEnd);

      const [from, to] = hit.template.inverse ? [object, subject.text] : [subject.text, object];
      relations.push({
        subject: from,
        label: hit.template.label,
        object: to,
        trigger: hit.template.trigger,
        start: subject.start,
        end: phraseEnd,
        context: snippet(text, subject.start, phraseEnd, RELATION_CONTEXT_RADIUS),
      });
    });

    return relations;
  }
}

function collapseByIdentity(spans: ExtractedEntity[]): ExtractedEntity[] {
  const firstByKey = new Map<string, ExtractedEntity>();
  const entities: ExtractedEntity[] = [];
  for (const span of spans) {
    const key = `${span.type}\u0000${span.normalized}`;
    const first = firstByKey.get(key);
    if (first) {
      first.occurrences++;
      continue;
    }
    const entity = { ...span };
    firstByKey.set(key, entity);
    entities.push(entity);
  }
  return entities;
}

function findSubject(
  text: string,
  triggerStart: number,
  spans: ExtractedEntity[],
): { text: string; start: number } | null {
  let before = text.slice(0, triggerStart).replace(/\s+$/, "");
  const auxiliary = AUXILIARY_TAIL.exec(before);
  if (auxiliary) before = before.slice(0, auxiliary.index).replace(/\s+$/, "");

  const entity = spans.find((s) => s.end === before.length);
  if (entity) return { text: entity.surface, start: entity.start };

  const token = /[A-Za-z]+$/.exec(before);
  if (token && PRONOUNS.has(token[0].toLowerCase())) {
    return { text: token[0], start: token.index };
  }
  return null;
}

function readNounPhrase(text: string, from: number, boundary: number): Word[] {
  const wordRe = /\s+([A-Za-z0-9](?:[\w'+#-]|\.(?=\w))*)/y;
  const stop = getStopWords();
  const words: Word[] = [];
  wordRe.lastIndex = from;

  for (let m = wordRe.exec(text); m; m = wordRe.exec(text)) {
    const start = m.index + m[0].length - m[1].length;
    if (start >= boundary) break;
    const lower = m[1].toLowerCase();
    if (words.length === 0 && DETERMINERS.has(lower)) continue;
    if (stop.has(lower)) break;
    words.push({ text: m[1], start, end: start + m[1].length });
    if (words.length === MAX_OBJECT_WORDS) break;
  }
  return words;
}
