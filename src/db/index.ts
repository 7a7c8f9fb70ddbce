/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/coverageMapsRepo";
export * from "./repos/bulletsRepo";
