import type { NextFunction, Request, Response } from 'express';
import type { ExportFormat } from '../services/exportService';
import { parseQuery } from '../middleware/validate';
import { exportQuerySchema } from '../validators/chapter';
import { getExportService, projectNameParam } from './shared';

const FORMAT_ALIASES: Record<string, ExportFormat> = {
  markdown: 'markdown',
  md: 'markdown',
  text: 'text',
  txt: 'text',
  zip: 'zip',
};

function parseChapterNumbers(raw?: string): number[] | undefined {
  if (!raw) {
    return undefined;
  }
  return raw.split(',').map((part) => Number(part.trim()) - 1);
}

function buildContentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\w\-.]+/g, '_');
  const encoded = encodeURIComponent(fileName);
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

function setDownloadHeaders(res: Response, fileName: string, contentType: string): void {
  res.setHeader('Content-Type', contentType);
  res.setHeader('Content-Disposition', buildContentDisposition(fileName));
  res.setHeader('Cache-Control', 'no-store');
}

export const exportProject = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const exportService = getExportService(req);
    const query = parseQuery(exportQuerySchema, req);
    const format = FORMAT_ALIASES[query.format] ?? 'markdown';
    const prepared = await exportService.prepareData(projectNameParam(req), {
      chapters: parseChapterNumbers(query.chapters),
    });

    res.setHeader('X-Export-Format', format);
    res.setHeader('X-Export-Chapter-Count', String(prepared.chapters.length));
    res.setHeader('X-Export-Range', prepared.range);

    if (format !== 'zip') {
      const document = format === 'text' ? exportService.renderText(prepared) : exportService.renderMarkdown(prepared);
      setDownloadHeaders(res, document.fileName, document.contentType);
      res.send(document.body);
      return;
    }

    const { archive, fileName } = exportService.createMarkdownArchive(prepared);
    setDownloadHeaders(res, fileName, 'application/zip');

    archive.on('error', (error) => {
      if (!res.headersSent) {
        next(error);
      } else {
        res.destroy(error);
      }
    });

    req.on('aborted', () => {
      if (!res.writableEnded) {
        archive.abort();
      }
    });

    archive.pipe(res);
    await archive.finalize();
  } catch (error) {
    next(error);
  }
};
