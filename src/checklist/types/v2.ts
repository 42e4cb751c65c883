/**
 * Normalized (v2) Recommendation Schema
 *
 * One v2 record is written per output file. Optional keys are omitted rather
 * than set to null, so a record serializes with exactly the keys its v1
 * source provided plus the always-present collections.
 */

/** 0 = High, 1 = Medium, 2 = Low */
export type V2Severity = 0 | 1 | 2;

export type V2SourceType = 'aprl' | 'wafsg' | 'local' | (string & {});

export interface V2Source {
  type: V2SourceType;
  file?: string;
}

/**
 * Either the empty default list or a single Resource Graph query.
 * The two shapes are kept as-is for compatibility with existing v2 files.
 */
export type V2Queries = never[] | { arg: string };

export interface V2Record {
  guid?: string;
  title?: string;
  description?: string;
  waf?: string;
  severity?: V2Severity;
  labels: Record<string, string>;
  queries: V2Queries;
  links: string[];
  source?: V2Source;
  service?: string;
  resourceTypes: string[];
}
