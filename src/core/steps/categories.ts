/**
 * Step categories of the built-in catalog.
 */
export const Category = {
  STRUCTURE: "structure",
  CONFIG: "config",
  APP_CONFIG: "app-config",
  DATABASE: "database",
  AUTH: "auth",
  EMAIL: "email",
  ROUTES: "routes",
  APP: "app",
  DEPLOYMENT: "deployment",
  TESTS: "tests",
} as const;

export type Category = (typeof Category)[keyof typeof Category];
