export const PDF_TEXT_READER = 'PDF_TEXT_READER';
export const PAGE_RASTERIZER = 'PAGE_RASTERIZER';
export const OCR_PROVIDER = 'OCR_PROVIDER';
