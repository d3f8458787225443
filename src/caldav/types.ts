export interface Calendar {
  path: string;
  name: string;
  description: string;
  maxResourceSize: number;
  supportedComponentSet: string[];
  color: string;
  timezone: string;
  syncToken: string;
  currentUserPrivileges: string[];
}

export interface CalendarObject {
  path: string;
  modTime: Date | null;
  contentLength: number;
  /** Entity tag without the surrounding quotes. */
  etag: string;
  /** Raw iCalendar text; `null` or empty when the server did not send it. */
  data: string | null;
}

export interface CalendarExpandRequest {
  start: Date;
  end: Date;
}

/** Which components and properties the server should return in calendar-data. */
export interface CalendarCompRequest {
  name: string;
  allProps?: boolean;
  props?: string[];
  allComps?: boolean;
  comps?: CalendarCompRequest[];
  expand?: CalendarExpandRequest;
}

export interface TextMatch {
  text: string;
  negateCondition?: boolean;
}

export interface ParamFilter {
  name: string;
  isNotDefined?: boolean;
  textMatch?: TextMatch;
}

export interface PropFilter {
  name: string;
  isNotDefined?: boolean;
  start?: Date;
  end?: Date;
  textMatch?: TextMatch;
  paramFilters?: ParamFilter[];
}

// A node either matches absence (isNotDefined) or carries child constraints,
// never both.
export interface CompFilter {
  name: string;
  isNotDefined?: boolean;
  start?: Date;
  end?: Date;
  props?: PropFilter[];
  comps?: CompFilter[];
}

export interface CalendarQueryRequest {
  compRequest: CalendarCompRequest;
  filter: CompFilter;
}

export interface SyncQuery {
  /** Empty or absent for an initial full sync. */
  syncToken?: string;
  /** Maximum number of results; absent or <= 0 means unlimited. */
  limit?: number;
  /** Relevance cutoff, applied on full syncs only. */
  startTime?: Date;
  /**
   * The token continues a truncated initial sync, so `startTime` still
   * applies.
   */
  initialSync?: boolean;
}

export interface SyncResponse {
  syncToken: string;
  calendar: Calendar | null;
  updated: CalendarObject[];
  deleted: string[];
  /** The server returned a partial result set; sync again with `syncToken`. */
  truncated: boolean;
}

export interface CalendarListSyncResult {
  nextSyncToken: string;
  updatedCalendars: Calendar[];
  deletedCalendars: string[];
}

export interface UpdateCalendarOptions {
  name?: string;
  description?: string;
  color?: string;
  timezone?: string;
}

export interface PutCalendarObjectOptions {
  ifMatch?: string;
  ifNoneMatch?: string;
}

export interface DeleteCalendarObjectOptions {
  ifMatch?: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
}
