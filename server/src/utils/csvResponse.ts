/**
 * CSV download responses
 *
 * Rows are arrays in header order; the header row is written even when
 * there are no rows.
 */

import type { Response } from 'express';
import { format } from 'fast-csv';
import { ExternalServiceError } from './errors.js';
import { httpLogger } from './logger.js';

export function sendCsv(
    res: Response,
    filename: string,
    headers: readonly string[],
    rows: readonly (readonly (string | number)[])[]
): Promise<void> {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename=${filename}`);

    return new Promise((resolve, reject) => {
        const csvStream = format({ headers: [...headers], alwaysWriteHeaders: true });

        csvStream.on('error', (error: Error) => {
            httpLogger.error({ filename, error: error.message }, 'CSV stream failed');
            reject(new ExternalServiceError('CSV export failed', 'csv', error));
        });
        res.on('close', () => resolve());

        csvStream.pipe(res);
        rows.forEach((row) => csvStream.write([...row]));
        csvStream.end();
    });
}
