/**
 * A financial line item the company configuration asks for.
 *
 * `rowIndex` is the 1-based position of the row in the source table and is
 * tried first. `labels` are the acceptable row captions in fallback order.
 * `columnLayout` names a layout that replaces the company default for this
 * field only.
 */
export interface FieldSpec {
  readonly key: string;
  readonly labels: readonly string[];
  readonly rowIndex?: number;
  readonly columnLayout?: string;
}
