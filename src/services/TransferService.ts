/**
 * Import and export of solutions: JSON records (single or batch), standalone
 * HTML documents and CodePen prefill payloads.
 */

import { z } from 'zod';
import type { Solution } from '../types/models.js';
import type { RejectedRecord, SolutionRecord } from '../types/database.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { LoadResult } from '../repositories/ISolutionRepository.js';
import { parseSolutionRecord, toSolutionRecord } from '../repositories/solution-record.js';
import { createSolution } from '../domain/solution.js';
import { detectCategory, detectTechStack, parseHtmlDocument } from '../domain/detection.js';
import { ValidationError } from '../errors.js';

export const EXPORTER_VERSION = '1.0.0';

export interface BatchExport {
  export_info: {
    export_time: string;
    solutions_count: number;
    exporter_version: string;
  };
  solutions: SolutionRecord[];
}

export interface CodePenPayload {
  title: string;
  description: string;
  html: string;
  css: string;
  js: string;
  css_external: string;
  js_external: string;
  css_pre_processor: 'none';
  js_pre_processor: 'none';
}

const batchSchema = z.object({ solutions: z.array(z.unknown()) });

const codePenSchema = z.object({
  title: z.string().default('Imported solution'),
  description: z.string().default(''),
  html: z.string().default(''),
  css: z.string().default(''),
  js: z.string().default(''),
});

export class TransferService {
  constructor(private readonly logProvider: ILogProvider) {}

  exportSolution(solution: Solution): SolutionRecord {
    return toSolutionRecord(solution);
  }

  exportBatch(solutions: readonly Solution[], exportedAt: Date = new Date()): BatchExport {
    return {
      export_info: {
        export_time: exportedAt.toISOString(),
        solutions_count: solutions.length,
        exporter_version: EXPORTER_VERSION,
      },
      solutions: solutions.map(toSolutionRecord),
    };
  }

  /** Accepts a single record or a `{ solutions: [...] }` batch. */
  importJson(data: unknown): LoadResult {
    const batch = batchSchema.safeParse(data);
    const records = batch.success ? batch.data.solutions : [data];

    const solutions: Solution[] = [];
    const rejected: RejectedRecord[] = [];

    records.forEach((record, index) => {
      const parsed = parseSolutionRecord(record);
      if (parsed.ok) {
        solutions.push(parsed.value);
      } else {
        rejected.push({ source: `solutions[${index}]`, reason: parsed.error });
      }
    });

    if (rejected.length > 0) {
      this.logProvider.warn('Some imported records were rejected', {
        imported: solutions.length,
        rejected: rejected.length,
      });
    }

    return { solutions, rejected };
  }

  importHtml(html: string, fallbackName: string): Solution {
    const parsed = parseHtmlDocument(html, fallbackName);
    return createSolution({
      name: parsed.name,
      htmlCode: parsed.htmlCode,
      cssCode: parsed.cssCode,
      jsCode: parsed.jsCode,
      techStack: parsed.techStack,
      category: parsed.category,
    });
  }

  importCodePen(data: unknown): Solution {
    const parsed = codePenSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Invalid CodePen payload', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const pen = parsed.data;
    return createSolution({
      name: pen.title,
      description: pen.description,
      htmlCode: pen.html,
      cssCode: pen.css,
      jsCode: pen.js,
      techStack: detectTechStack(pen.css, pen.js),
      category: detectCategory(pen.html, pen.css),
    });
  }

  toCodePen(solution: Solution): CodePenPayload {
    return {
      title: solution.name,
      description: solution.description,
      html: solution.htmlCode,
      css: solution.cssCode,
      js: solution.jsCode,
      css_external: '',
      js_external: '',
      css_pre_processor: 'none',
      js_pre_processor: 'none',
    };
  }

  toStandaloneHtml(solution: Solution): string {
    return [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '<head>',
      '  <meta charset="UTF-8">',
      '  <meta name="viewport" content="width=device-width, initial-scale=1.0">',
      `  <meta name="description" content="${escapeHtml(solution.description)}">`,
      `  <title>${escapeHtml(solution.name)}</title>`,
      '  <style>',
      solution.cssCode,
      '  </style>',
      '</head>',
      '<body>',
      solution.htmlCode,
      '  <script>',
      solution.jsCode,
      '  </script>',
      '</body>',
      '</html>',
    ].join('\n');
  }
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
