import type { CategoryInput, CategorySource } from "../types";
import { CATCH_ALL_CATEGORY } from "../config/analysis.config";
import { customFieldText } from "../utils/custom-field";

/**
 * Settings the resolver needs from the analysis configuration
 */
export interface CategorizationOptions {
  categorySource: CategorySource | null;
  customFieldId: string;
  /** Primary categories, uppercased, in match order */
  categories: string[];
}

/**
 * Service responsible for assigning each ticket exactly one work category
 */
export class CategorizationService {
  constructor(private readonly options: CategorizationOptions) {}

  /**
   * Display columns: the primary categories followed by the catch-all
   */
  get columns(): string[] {
    return [...this.options.categories, CATCH_ALL_CATEGORY];
  }

  /**
   * Resolves the category for one ticket from the configured source.
   * Never throws; anything that cannot be matched falls back to the catch-all.
   * @param input - Labels, component names and custom field value of the ticket
   * @returns A primary category or the catch-all
   */
  resolveCategory(input: CategoryInput): string {
    switch (this.options.categorySource) {
      case "labels":
        return this.fromLabels(input.labels);
      case "components":
        return this.fromComponents(input.components);
      case "customfield":
        return this.options.customFieldId
          ? this.fromCustomField(input)
          : CATCH_ALL_CATEGORY;
      default:
        return CATCH_ALL_CATEGORY;
    }
  }

  /**
   * First configured category present among the labels
   */
  private fromLabels(labels: string[]): string {
    const upper = new Set(labels.map((label) => label.toUpperCase()));
    return (
      this.options.categories.find((category) => upper.has(category)) ??
      CATCH_ALL_CATEGORY
    );
  }

  /**
   * First configured category that names a component or appears inside one,
   * so short codes match full component names
   */
  private fromComponents(components: string[]): string {
    const upper = components.map((name) => name.toUpperCase());
    return (
      this.options.categories.find((category) =>
        upper.some((name) => name.includes(category))
      ) ?? CATCH_ALL_CATEGORY
    );
  }

  private fromCustomField(input: CategoryInput): string {
    const text = customFieldText(input.customField);
    return this.options.categories.includes(text) ? text : CATCH_ALL_CATEGORY;
  }
}
