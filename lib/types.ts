export type DeviceType = 'mobile' | 'tablet' | 'default';

export interface DeviceInfo {
  type: DeviceType;
  legacyBrowser: boolean; // Internet Explorer: no JS nav, no modals
}

export const CompletionTracking = { NONE: 0, MANUAL: 1, AUTOMATIC: 2 } as const;
export type CompletionTrackingMode = typeof CompletionTracking[keyof typeof CompletionTracking];

export const CompletionState = { INCOMPLETE: 0, COMPLETE: 1, COMPLETE_PASS: 2, COMPLETE_FAIL: 3 } as const;

export const UrlDisplay = { AUTO: 0, EMBED: 1, FRAME: 2, NEW: 3, DOWNLOAD: 4, OPEN: 5, POPUP: 6 } as const;
export type UrlDisplayMode = typeof UrlDisplay[keyof typeof UrlDisplay];

export const TextFormat = { MOODLE: 0, HTML: 1, PLAIN: 2, MARKDOWN: 4 } as const;
export type TextFormatId = typeof TextFormat[keyof typeof TextFormat];

export interface CourseRecord {
  id: number;
  fullname: string;
  contextId: number;
  baseColour?: string | null; // hex like #1670cc, course-level override
  completionEnabled: boolean;
}

export interface CourseModuleRecord {
  id: number;
  courseId: number;
  instance: number; // row id in the module's own table (url, page, resource...)
  modname: string;
  name: string;
  sectionId: number;
  sectionNumber: number;
  contextId: number;
  visible: boolean;
  completion: CompletionTrackingMode;
}

export interface UrlRecord {
  id: number;
  externalUrl: string;
  display: UrlDisplayMode;
}

export interface ContentRecord {
  intro?: string | null;
  content?: string | null;
  contentFormat: TextFormatId;
  revision?: number | null;
}

export interface StoredFile {
  contextId: number;
  component: string;
  filearea: string;
  itemId: number;
  filepath: string; // always starts and ends with '/'
  filename: string; // '.' marks a directory entry
  filesize: number;
  mimetype: string | null;
}

export interface CourseModuleInfo {
  id: number;
  courseId: number;
  moduleContextId: number;
  courseContextId: number;
  name: string;
  modname: string;
  sectionNumber: number;
  sectionId: number;
  completionEnabled: boolean;
  completionState: number | null;
  isComplete: boolean;
  isManualCompletion: boolean;
  resourceType: string;
  pluginFileUrl: string;
  modalAllowed: boolean;
}

export interface ModalAllowList {
  resources: string[];
  modules: string[];
}

// Collaborators

export interface ConfigStore {
  get(component: string, name: string): Promise<string | null>;
  set(component: string, name: string, value: string | null): Promise<void>;
}

export interface PreferenceStore {
  get(name: string): Promise<string | null>;
  set(name: string, value: string | null): Promise<void>;
}

export type SessionValue = string | number;

export interface SessionStore {
  get(key: string): SessionValue | undefined;
  set(key: string, value: SessionValue): void;
  delete(key: string): void;
  has(key: string): boolean;
}

export interface CourseCatalog {
  getCourse(courseId: number): Promise<CourseRecord | null>;
  getCourseModule(courseId: number, cmid: number): Promise<CourseModuleRecord | null>;
  hasCapability(capability: string, contextId: number): Promise<boolean>;
  getCompletionState(cmid: number): Promise<number | null>;
  getUrlRecord(instance: number): Promise<UrlRecord | null>;
  getContentRecord(modname: string, instance: number): Promise<ContentRecord | null>;
}

export interface FileStorage {
  getAreaFiles(contextId: number, component: string, filearea: string): Promise<StoredFile[]>;
}

export interface TextFilter {
  name: string;
  filter(text: string, contextId: number): string;
}

export interface RequestUser {
  id: number;
  isGuest: boolean;
}

export interface RequestContext {
  user: RequestUser;
  device: DeviceInfo;
  config: ConfigStore;
  preferences: PreferenceStore;
  session: SessionStore;
  catalog: CourseCatalog;
  files: FileStorage;
  filters: TextFilter[];
  params: URLSearchParams;
  wwwroot: string;
  themeName: string;
}
