import { ulid } from "ulid";

export type LocalJobId = `local_${string}`;

const LOCAL_JOB_ID_RE = /^local_[0-9A-HJKMNP-TV-Z]{26}$/;

export function newLocalJobId(): LocalJobId {
  return `local_${ulid()}`;
}

export function isLocalJobId(value: string): value is LocalJobId {
  return LOCAL_JOB_ID_RE.test(value);
}
