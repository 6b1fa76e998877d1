import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveOcrWorkerPaths } from './tesseract-ocr.provider';

describe('resolveOcrWorkerPaths', () => {
  it('reads language data from the installed package and caches locally', () => {
    const paths = resolveOcrWorkerPaths(new ConfigService({}));

    expect(paths.langPath).toContain(join('@tesseract.js-data', 'eng', '4.0.0_best_int'));
    expect(paths.langPath).not.toMatch(/^https?:/);
    expect(paths.cachePath).toBe(join(tmpdir(), 'clinical-ingestion-ocr'));
  });

  it('takes configured directories', () => {
    const paths = resolveOcrWorkerPaths(
      new ConfigService({ OCR_LANG_PATH: '/opt/tessdata', OCR_CACHE_DIR: '/var/cache/ocr' }),
    );

    expect(paths).toEqual({ langPath: '/opt/tessdata', cachePath: '/var/cache/ocr' });
  });
});
