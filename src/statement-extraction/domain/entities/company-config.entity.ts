import { FieldSpec } from './field-spec.entity';

export interface CompanyConfig {
  readonly key: string;
  readonly displayName: string;
  readonly aliases: readonly string[];
  readonly defaultColumnLayout: string;
  readonly fields: readonly FieldSpec[];
}
