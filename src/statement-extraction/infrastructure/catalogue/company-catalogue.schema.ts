import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

/**
 * Company Catalogue Schemas
 *
 * On-disk shape of the company catalogue (config/companies.json). Field
 * names follow the JSON file; the loader maps them onto the registry's
 * definition after validation. Cross-references (layout names, a field
 * needing a row index or labels) are checked by the registry.
 */

export class PeriodColumnSchema {
  @IsString()
  @IsNotEmpty()
  period!: string;

  @IsInt()
  column!: number;
}

export class ColumnLayoutSchema {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsInt()
  label!: number;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PeriodColumnSchema)
  periods!: PeriodColumnSchema[];
}

export class FinancialFieldSchema {
  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  labels?: string[];

  @IsOptional()
  @IsInt()
  tr_number?: number;

  @IsOptional()
  @IsString()
  column_layout?: string;
}

export class CompanySchema {
  @IsString()
  @IsNotEmpty()
  key!: string;

  @IsString()
  @IsNotEmpty()
  display_name!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  aliases?: string[];

  @IsString()
  column_layout!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FinancialFieldSchema)
  financial_data!: FinancialFieldSchema[];
}

export class PageHeadingsSchema {
  @IsArray()
  @IsString({ each: true })
  standalone!: string[];

  @IsArray()
  @IsString({ each: true })
  generic!: string[];

  @IsString()
  @IsNotEmpty()
  consolidated_marker!: string;
}

export class CompanyCatalogueSchema {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => ColumnLayoutSchema)
  column_layouts!: ColumnLayoutSchema[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CompanySchema)
  companies!: CompanySchema[];

  @IsOptional()
  @IsObject()
  key_aliases?: Record<string, string>;

  @IsObject()
  @ValidateNested()
  @Type(() => PageHeadingsSchema)
  page_headings!: PageHeadingsSchema;
}
