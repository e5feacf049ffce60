// Injection tokens for ports and shared values
export const GROUND_POLICY = Symbol('GroundPolicy');
export const CLOCK = Symbol('Clock');
export const CALENDAR_STORE = Symbol('CalendarStore');
export const LEDGER_STORE = Symbol('LedgerStore');
export const NOTIFICATION_SINK = Symbol('NotificationSink');
export const EXTRACTOR = Symbol('Extractor');
