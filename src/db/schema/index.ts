/**
 * CareDesk - Schema barrel export
 */

export * from "./auth.ts";
export * from "./departments.ts";
export * from "./doctors.ts";
export * from "./patients.ts";
export * from "./scheduling.ts";
export * from "./emr.ts";
