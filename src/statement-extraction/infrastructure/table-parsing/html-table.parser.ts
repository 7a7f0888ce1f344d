import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';
import {
  TableCandidate,
  createTableCandidate,
} from '../../domain/entities/table-candidate.entity';
import { TableParseError } from '../../domain/errors/table-parse.error';

/**
 * HTML Table Parser
 *
 * Adapter for the HTML the table-structure collaborator writes per
 * extracted table. Rows come from `tr`, cells from `td`/`th` in document
 * order, and the candidate text is the table's full text content.
 */
@Injectable()
export class HtmlTableParser {
  /**
   * Parse the first table of an HTML document.
   * @throws TableParseError when the document holds no table
   */
  parse(html: string, source?: string): TableCandidate {
    const $ = cheerio.load(html);

    if ($('table').length === 0) {
      throw new TableParseError('No table found in HTML', source);
    }

    return this.toCandidate($, 0);
  }

  parseAll(html: string): TableCandidate[] {
    const $ = cheerio.load(html);
    return $('table')
      .toArray()
      .map((_, index) => this.toCandidate($, index));
  }

  /**
   * Lazy loader for the table scorer: parsing happens when the candidate is
   * scored, and a failure only drops that candidate.
   */
  loader(html: string, source?: string): () => TableCandidate {
    return () => this.parse(html, source);
  }

  private toCandidate($: cheerio.CheerioAPI, index: number): TableCandidate {
    const table = $('table').eq(index);
    const rows = table
      .find('tr')
      .toArray()
      .map((row) =>
        $(row)
          .find('td, th')
          .toArray()
          .map((cell) => $(cell).text().trim()),
      );

    return createTableCandidate(rows, table.text());
  }
}
