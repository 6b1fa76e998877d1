export const CLINICAL_EXTRACTORS = 'CLINICAL_EXTRACTORS';
