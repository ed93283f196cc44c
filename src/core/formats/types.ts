/**
 * A relationship statement: both endpoints are created if missing.
 */
export interface Fact {
  from: string;
  to: string;
  relation: string;
  fromType?: string;
  toType?: string;
}
