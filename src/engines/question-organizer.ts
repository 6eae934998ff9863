/**
 * Question Organizer
 *
 * Groups the flat question list into category → sub-factor → questions,
 * keeping first-seen order at every level.
 */

import type { Question } from '../types/index.js';

const SUBFACTOR_NAMES: Readonly<Record<string, string>> = {
  env: 'Environmental',
  org: 'Organizational',
  ind: 'Individual',
};

export interface OrganizedSubfactor {
  code: string;
  name: string;
  questions: Question[];
}

export interface OrganizedCategory {
  label: string;
  name: string;
  subfactors: OrganizedSubfactor[];
}

/**
 * Display name of a category: "n.3 Intermediaries" → "Intermediaries"
 */
export function cleanCategoryName(label: string): string {
  const trimmed = label.trim();
  const match = /^n\.\d+\s+(.+)$/s.exec(trimmed);
  return match?.[1] ? match[1].trim() : trimmed;
}

/**
 * Display name of a sub-factor code; unknown codes display as-is
 */
export function subfactorName(code: string): string {
  return SUBFACTOR_NAMES[code] ?? code;
}

export class QuestionOrganizer {
  private readonly grouped = new Map<string, OrganizedCategory>();
  private readonly byId = new Map<string, Question>();

  constructor(questions: readonly Question[]) {
    for (const question of questions) {
      const { category, subfactor } = question;
      // Questions without both labels stay out of the structure
      if (!category || !subfactor) {
        continue;
      }

      let organized = this.grouped.get(category);
      if (!organized) {
        organized = { label: category, name: cleanCategoryName(category), subfactors: [] };
        this.grouped.set(category, organized);
      }

      let group = organized.subfactors.find((entry) => entry.code === subfactor);
      if (!group) {
        group = { code: subfactor, name: subfactorName(subfactor), questions: [] };
        organized.subfactors.push(group);
      }

      group.questions.push(question);
      this.byId.set(question.id, question);
    }
  }

  /** Number of organized questions */
  get size(): number {
    return this.byId.size;
  }

  categories(): string[] {
    return [...this.grouped.keys()];
  }

  getCategory(label: string): OrganizedCategory | undefined {
    return this.grouped.get(label);
  }

  /**
   * Every organized category, in first-seen order
   */
  organized(): OrganizedCategory[] {
    return [...this.grouped.values()];
  }

  /**
   * Question counts per category and sub-factor code
   */
  summary(): Record<string, Record<string, number>> {
    const summary: Record<string, Record<string, number>> = {};
    for (const category of this.grouped.values()) {
      const counts: Record<string, number> = {};
      for (const group of category.subfactors) {
        counts[group.code] = group.questions.length;
      }
      summary[category.label] = counts;
    }
    return summary;
  }

  /**
   * Organized questions re-listed in grouping order
   */
  allQuestions(): Question[] {
    return this.organized().flatMap((category) =>
      category.subfactors.flatMap((group) => group.questions)
    );
  }

  getQuestion(id: string): Question | undefined {
    return this.byId.get(id);
  }
}
