import type { Express, Request, Response } from 'express';
import type { ChalkInstance } from 'chalk';
import type { ReportKind } from '../utils/avwx-client.js';
import type { WxConfig } from '../utils/config.js';
import { ansiPainter, paintFragment, plainPainter } from '../utils/paint.js';
import { airfield, coordinates, type Position } from '../utils/position.js';
import { ReportUnavailableError, colorizeReport, type ReportService } from '../utils/report-service.js';

type QueryResult<T> = { ok: true; value: T } | { ok: false; error: string };

const REPORT_KINDS: readonly ReportKind[] = ['metar', 'taf'];

const PAINTERS: Record<string, ChalkInstance> = {
  text: plainPainter,
  ansi: ansiPainter,
};

const parseFiniteNumber = (raw: unknown): number | null => {
  if (typeof raw !== 'string' || raw.trim() === '') {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : null;
};

/** `airfield` wins, then a complete `lat`/`lon` pair; with neither the configured position is used. */
export const resolveQueryPosition = (query: Request['query'], fallback: Position): QueryResult<Position> => {
  const { airfield: icao, lat, lon } = query;
  if (typeof icao === 'string' && icao.trim()) {
    return { ok: true, value: airfield(icao) };
  }
  if (lat === undefined && lon === undefined) {
    return { ok: true, value: fallback };
  }
  const parsedLat = parseFiniteNumber(lat);
  const parsedLon = parseFiniteNumber(lon);
  if (parsedLat === null || parsedLon === null) {
    return { ok: false, error: 'Provide both lat and lon as numbers.' };
  }
  return { ok: true, value: coordinates(parsedLat, parsedLon) };
};

const resolvePainter = (format: unknown): QueryResult<ChalkInstance> => {
  const key = format === undefined ? 'text' : format;
  if (typeof key === 'string' && Object.hasOwn(PAINTERS, key)) {
    return { ok: true, value: PAINTERS[key] };
  }
  return { ok: false, error: 'format must be "text" or "ansi".' };
};

interface RegisterReportRoutesOptions {
  app: Express;
  reportService: ReportService;
  config: Readonly<WxConfig>;
  now?: () => number;
}

export const registerReportRoutes = ({ app, reportService, config, now = Date.now }: RegisterReportRoutesOptions) => {
  for (const kind of REPORT_KINDS) {
    app.get(`/api/${kind}`, async (req: Request, res: Response) => {
      const position = resolveQueryPosition(req.query, config.position);
      if (!position.ok) {
        return res.status(400).json({ error: position.error });
      }
      const painter = resolvePainter(req.query.format);
      if (!painter.ok) {
        return res.status(400).json({ error: painter.error });
      }

      try {
        const decoded = await reportService.getReport(kind, position.value);
        return res.json({
          station: decoded.report.station,
          exactMatch: decoded.report.exactMatch,
          report: paintFragment(colorizeReport(decoded, config, now()), painter.value),
        });
      } catch (error) {
        if (error instanceof ReportUnavailableError) {
          console.warn(`[${res.locals.requestId}] ${kind} unavailable:`, error.message);
          return res.status(502).json({ error: 'No usable report.' });
        }
        console.error(`[${res.locals.requestId}] ${kind} failed:`, error);
        return res.status(500).json({ error: 'Internal error.' });
      }
    });
  }
};
