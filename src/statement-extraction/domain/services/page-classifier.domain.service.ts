import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { PageHeadingRules } from '../entities/page-heading-rules.entity';
import { PageMatchRule } from '../enums/page-match-rule.enum';
import { normalizePageText } from '../utils/text-normalization.util';

export type PageClassification =
  | { found: true; pageIndex: number; rule: PageMatchRule }
  | { found: false };

export const PAGE_NOT_FOUND: PageClassification = Object.freeze({
  found: false,
});

/**
 * Page Classifier
 *
 * Finds the page that carries the target statement when a filing holds
 * both consolidated and standalone variants with near-identical headings.
 *
 * Per page, in document order:
 * 1. An explicit-standalone heading returns the page at once.
 * 2. Otherwise a generic heading returns the page, but only when the page
 *    does not mention the consolidated marker.
 *
 * No match anywhere is not an error; callers fall back to the whole document.
 */
@Injectable()
export class PageClassifierDomainService {
  private readonly logger = new Logger(PageClassifierDomainService.name);
  private readonly preferStandalone: boolean;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.preferStandalone =
      this.configService.get('statementExtraction.preferStandalone', {
        infer: true,
      }) !== false; // Default true
  }

  classify(
    pages: ReadonlyArray<string | null | undefined>,
    rules: PageHeadingRules,
    options: { preferStandalone?: boolean } = {},
  ): PageClassification {
    const preferStandalone = options.preferStandalone ?? this.preferStandalone;

    for (const [pageIndex, page] of pages.entries()) {
      const text = normalizePageText(page);
      if (text.length === 0) {
        continue;
      }

      if (rules.standalone.some((pattern) => pattern.test(text))) {
        this.logger.log(
          `[PAGE-CLASSIFIER] Page ${pageIndex + 1}: standalone statement heading (explicit)`,
        );
        return { found: true, pageIndex, rule: PageMatchRule.EXPLICIT_STANDALONE };
      }

      if (preferStandalone && text.includes(rules.consolidatedMarker)) {
        this.logger.debug(
          `[PAGE-CLASSIFIER] Page ${pageIndex + 1}: skipped, mentions "${rules.consolidatedMarker}"`,
        );
        continue;
      }

      if (rules.generic.some((pattern) => pattern.test(text))) {
        this.logger.log(
          `[PAGE-CLASSIFIER] Page ${pageIndex + 1}: generic statement heading`,
        );
        return { found: true, pageIndex, rule: PageMatchRule.GENERIC };
      }
    }

    this.logger.warn(
      `[PAGE-CLASSIFIER] No target page among ${pages.length} page(s)`,
    );
    return PAGE_NOT_FOUND;
  }
}
