/**
 * Analysis Registry - the fixed catalogue of named analyses.
 *
 * Definitions are type-erased on registration: parameters are parsed into the
 * definition's own type inside prepare(), so the registry can hold analyses
 * with different parameter and result types side by side.
 */

import type { PolicyDefaults } from '../types';
import type {
  AnalysisCategory,
  AnalysisContext,
  AnalysisDefinition,
  AnalysisResult,
  InputSchema,
  Requirement,
} from './types';

export interface PreparedAnalysis {
  /** Dataset gate for these parameters, if any */
  requirement?: Requirement;
  run(ctx: AnalysisContext): Promise<AnalysisResult<unknown>>;
}

export interface RegisteredAnalysis {
  name: string;
  description: string;
  category: AnalysisCategory;
  input_schema: InputSchema;
  tags: string[];
  /** Static requirement; undefined when composite or parameter-dependent */
  requires?: Requirement;
  /** True when the requirement depends on the parameters */
  dynamicRequirement: boolean;
  /** Parse input (throws InvalidInputError) and bind it to the run */
  prepare(input: Record<string, unknown>, policy: PolicyDefaults): PreparedAnalysis;
}

export type RequirementSpec<P> = Requirement | ((params: P) => Requirement);

export interface AnalysisSpec<P, R> extends Omit<AnalysisDefinition<P, R>, 'requires'> {
  requires?: RequirementSpec<P>;
}

export function defineAnalysis<P, R>(spec: AnalysisSpec<P, R>): RegisteredAnalysis {
  const { requires } = spec;
  return {
    name: spec.name,
    description: spec.description,
    category: spec.category,
    input_schema: spec.input_schema,
    tags: spec.tags ?? [],
    requires: typeof requires === 'function' ? undefined : requires,
    dynamicRequirement: typeof requires === 'function',
    prepare(input, policy) {
      const params = spec.parse(input, policy);
      return {
        requirement: typeof requires === 'function' ? requires(params) : requires,
        run: async (ctx) => spec.run(ctx, params),
      };
    },
  };
}

export interface SearchQuery {
  category?: AnalysisCategory;
  query?: string;
}

export class AnalysisRegistry {
  private analyses: Map<string, RegisteredAnalysis> = new Map();
  private byCategory: Map<AnalysisCategory, Set<string>> = new Map();
  private tagIndex: Map<string, Set<string>> = new Map();

  register(analysis: RegisteredAnalysis): void {
    if (this.analyses.has(analysis.name)) {
      throw new Error(`Analysis already registered: ${analysis.name}`);
    }
    this.analyses.set(analysis.name, analysis);

    let set = this.byCategory.get(analysis.category);
    if (!set) {
      set = new Set();
      this.byCategory.set(analysis.category, set);
    }
    set.add(analysis.name);

    for (const tag of analysis.tags) {
      const lower = tag.toLowerCase();
      let tagged = this.tagIndex.get(lower);
      if (!tagged) {
        tagged = new Set();
        this.tagIndex.set(lower, tagged);
      }
      tagged.add(analysis.name);
    }
  }

  registerAll(analyses: RegisteredAnalysis[]): void {
    for (const analysis of analyses) {
      this.register(analysis);
    }
  }

  get(name: string): RegisteredAnalysis | undefined {
    return this.analyses.get(name);
  }

  has(name: string): boolean {
    return this.analyses.has(name);
  }

  size(): number {
    return this.analyses.size;
  }

  list(): RegisteredAnalysis[] {
    return Array.from(this.analyses.values());
  }

  names(): string[] {
    return Array.from(this.analyses.keys());
  }

  searchByCategory(category: AnalysisCategory): RegisteredAnalysis[] {
    const names = this.byCategory.get(category);
    if (!names) return [];
    const result: RegisteredAnalysis[] = [];
    for (const name of names) {
      const analysis = this.analyses.get(name);
      if (analysis) result.push(analysis);
    }
    return result;
  }

  searchByText(query: string): RegisteredAnalysis[] {
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    const scored = new Map<string, number>();

    for (const term of terms) {
      for (const name of this.tagIndex.get(term) ?? []) {
        scored.set(name, (scored.get(name) ?? 0) + 3);
      }
    }

    for (const [name, analysis] of this.analyses) {
      let score = scored.get(name) ?? 0;
      const descLower = analysis.description.toLowerCase();
      for (const term of terms) {
        if (name.includes(term)) score += 2;
        if (descLower.includes(term)) score += 1;
      }
      if (score > 0) scored.set(name, score);
    }

    return Array.from(scored.entries())
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .map(([name]) => this.analyses.get(name))
      .filter((a): a is RegisteredAnalysis => a !== undefined);
  }

  search(query: SearchQuery): RegisteredAnalysis[] {
    let results = query.query ? this.searchByText(query.query) : this.list();
    if (query.category) {
      results = results.filter((a) => a.category === query.category);
    }
    return results;
  }
}
