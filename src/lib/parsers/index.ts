export {
  extractText,
  validateFile,
  isSupportedFileType,
  getFileExtension,
  formatPageMarker,
  FileTextExtractor,
  SUPPORTED_EXTENSIONS,
  MAX_FILE_SIZE,
  type TextExtractor,
  type SupportedExtension,
} from './file-parser';
