/**
 * Common enumerations used across modules
 */

// Envelope error codes with a dedicated error class
export enum ApiErrorCode {
  EMAIL_EXISTS = 100,
  LOGIN_EXISTS = 101,
  USER_NOT_FOUND = 102,
  BAD_CREDENTIALS = 103,
}

// Complaint reasons accepted by POST /posts/{id}/complaint
export enum ComplaintType {
  UNACCEPTABLE_MATERIALS = 1,
  INSULTS_ME = 2,
  INSULTS_RUSSIA = 3,
}

const COMPLAINT_TYPES: readonly number[] = [
  ComplaintType.UNACCEPTABLE_MATERIALS,
  ComplaintType.INSULTS_ME,
  ComplaintType.INSULTS_RUSSIA,
];

export function isComplaintType(value: number): value is ComplaintType {
  return COMPLAINT_TYPES.includes(value);
}
