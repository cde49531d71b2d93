/**
 * @module documents
 */

export type { Document, FoundItem } from "./types.js";
