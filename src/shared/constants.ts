/**
 * Shared constants: default model names and canonical answer texts.
 */

/** Default OpenAI embedding model */
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

/** Base name of the local feature-hashing model; a vocabulary fingerprint is appended after fitting */
export const DEFAULT_HASHING_MODEL = 'tfidf-hash-256';

/** Canonical answer when nothing in the corpus matches the question */
export const NO_DATA_MESSAGE =
  'Không biết. Không có dữ liệu về hành vi này trong cơ sở dữ liệu luật giao thông hiện có.';

/** Shown alongside NO_DATA_MESSAGE */
export const NO_DATA_SUGGESTIONS: readonly string[] = [
  'Thử diễn đạt lại câu hỏi với mô tả cụ thể hơn về hành vi vi phạm',
  'Nêu rõ loại phương tiện (xe máy, ô tô, xe đạp, …)',
  'Sử dụng các từ khóa như: vượt đèn đỏ, không đội mũ bảo hiểm, nồng độ cồn, quá tốc độ',
];

/** Prefix of every LOW-confidence answer */
export const LOW_CONFIDENCE_NOTICE =
  'Độ tin cậy thấp: kết quả dưới đây có thể không khớp chính xác với câu hỏi, vui lòng kiểm tra lại văn bản pháp luật.';

/** Shown with LOW-confidence answers */
export const LOW_CONFIDENCE_SUGGESTIONS: readonly string[] = [
  'Mô tả hành vi cụ thể hơn để có kết quả chính xác hơn',
  'Đối chiếu điều khoản được trích dẫn trong văn bản gốc',
];
