/**
 * Base Extractors - Barrel Export
 */

export type { IListingExtractor } from "./IListingExtractor";
export type { IDetailExtractor } from "./IDetailExtractor";
