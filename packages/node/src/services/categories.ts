/**
 * Expense category catalogue, read from data/expense-categories.json.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const CategorySchema = z.object({
  category: z.string().min(1),
  subcategories: z.array(z.string().min(1)),
});

const CatalogueSchema = z.array(CategorySchema);

export type ExpenseCategory = z.infer<typeof CategorySchema>;

export const DEFAULT_CATEGORIES_PATH = new URL("../../data/expense-categories.json", import.meta.url);

/**
 * @throws {z.ZodError} if the file does not hold a category list
 */
export function loadExpenseCategories(
  path: string | URL = DEFAULT_CATEGORIES_PATH,
): readonly ExpenseCategory[] {
  return CatalogueSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}
