export { detectAndNormalize, normalizeVerse, type DetectionResult, type PayloadShape } from './FormatDetector';
export { extract, extractCommentary, isTextType, EXTRACTION_CHAINS } from './FieldExtractor';
export { validateVerses } from './VerseValidator';
export { BatchOrchestrator, isLanguageCode, primaryTextType } from './BatchOrchestrator';
export { BatchValidationError } from './errors';
export { getRecommendedVoice, voicesFor } from './voices';
