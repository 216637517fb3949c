export interface TelnyxEventMeta {
  eventType?: string;
  callControlId?: string;
  direction?: string;
  hangupCause?: string;
}
