export { ApiErrorCode, ComplaintType, isComplaintType } from './enums'
export { DEFAULT_PAGE_LIMIT, DEFAULT_PAGE_OFFSET } from './pagination'
export { envelopeSchema } from './response'
export type { Envelope } from './response'
