/**
 * @coffer/node — HTTP service.
 *
 * Public API:
 * - createApp: the Hono app over a CofferEngine, without a server
 * - loadConfig / engineOptionsFromConfig: zod-validated environment
 * - httpPriceLookup: price oracle backed by an HTTP feed
 * - loadExpenseCategories: the category catalogue
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, engineOptionsFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { httpPriceLookup } from "./services/price-feed.js";
export type { HttpPriceFeedConfig } from "./services/price-feed.js";
export { loadExpenseCategories, DEFAULT_CATEGORIES_PATH } from "./services/categories.js";
export type { ExpenseCategory } from "./services/categories.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
