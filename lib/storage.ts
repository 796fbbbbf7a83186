import { promises as fs } from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { z } from 'zod';
import type {
  ConfigStore, ContentRecord, CourseCatalog, CourseModuleRecord, CourseRecord, FileStorage, PreferenceStore,
  RequestUser, StoredFile, UrlRecord,
} from './types';
import { installDefaultSettings } from './settings';

function resolveDbUrl(): string | null {
  // Prefer DATABASE_URL, else fall back to Vercel Postgres envs
  const direct = process.env.DATABASE_URL
    || process.env.POSTGRES_URL
    || process.env.POSTGRES_PRISMA_URL
    || process.env.POSTGRES_URL_NON_POOLING
    || null;
  if (direct) return direct;
  const { PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE } = process.env;
  if (PGHOST && PGUSER && PGPASSWORD && PGDATABASE) {
    const port = PGPORT ? `:${PGPORT}` : '';
    // Default to sslmode=require for hosted providers
    return `postgres://${encodeURIComponent(PGUSER)}:${encodeURIComponent(PGPASSWORD)}@${PGHOST}${port}/${PGDATABASE}?sslmode=require`;
  }
  return null;
}

const DB_URL = resolveDbUrl();
const DATA_DIR = process.env.DATA_DIR || path.join(process.cwd(), 'data');
const DATA_FILE = path.join(DATA_DIR, 'db.json');

let pool: Pool | null = null;
function getPool(): Pool {
  if (!DB_URL) throw new Error('No DATABASE_URL');
  if (!pool) {
    pool = new Pool({ connectionString: DB_URL, ssl: DB_URL.includes('sslmode=require') ? { rejectUnauthorized: false } : undefined });
  }
  return pool;
}

// Record schemas: shared by JSON file parsing and DB row mapping

const completionMode = z.union([z.literal(0), z.literal(1), z.literal(2)]);
const displayMode = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5), z.literal(6)]);
const textFormat = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(4)]);

const courseSchema = z.object({
  id: z.number().int(),
  fullname: z.string(),
  contextId: z.number().int(),
  baseColour: z.string().nullable().optional(),
  completionEnabled: z.boolean(),
});

const moduleSchema = z.object({
  id: z.number().int(),
  courseId: z.number().int(),
  instance: z.number().int(),
  modname: z.string(),
  name: z.string(),
  sectionId: z.number().int(),
  sectionNumber: z.number().int(),
  contextId: z.number().int(),
  visible: z.boolean(),
  completion: completionMode,
});

const urlSchema = z.object({ id: z.number().int(), externalUrl: z.string(), display: displayMode });

const contentSchema = z.object({
  intro: z.string().nullable().optional(),
  content: z.string().nullable().optional(),
  contentFormat: textFormat,
  revision: z.number().int().nullable().optional(),
});

const fileSchema = z.object({
  contextId: z.number().int(),
  component: z.string(),
  filearea: z.string(),
  itemId: z.number().int(),
  filepath: z.string(),
  filename: z.string(),
  filesize: z.number(),
  mimetype: z.string().nullable(),
});

const jsonStoreSchema = z.object({
  config: z.record(z.record(z.string())).default({}),
  preferences: z.record(z.record(z.string())).default({}),
  courses: z.array(courseSchema).default([]),
  modules: z.array(moduleSchema).default([]),
  completions: z.array(z.object({ userId: z.number().int(), cmid: z.number().int(), state: z.number().int() })).default([]),
  capabilities: z.array(z.object({ userId: z.number().int(), contextId: z.number().int(), capability: z.string() })).default([]),
  files: z.array(fileSchema).default([]),
  urls: z.array(urlSchema).default([]),
  contents: z.array(contentSchema.extend({ modname: z.string(), instance: z.number().int() })).default([]),
});

type JsonStore = z.infer<typeof jsonStoreSchema>;

async function readJson(): Promise<JsonStore> {
  try {
    const raw = await fs.readFile(DATA_FILE, 'utf8');
    return jsonStoreSchema.parse(JSON.parse(raw));
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      const empty = jsonStoreSchema.parse({});
      await writeJson(empty);
      return empty;
    }
    throw e;
  }
}

async function writeJson(data: JsonStore) {
  await fs.mkdir(path.dirname(DATA_FILE), { recursive: true });
  await fs.writeFile(DATA_FILE, JSON.stringify({ ...data, __rev: Date.now() }, null, 2), 'utf8');
}

let schemaReady: Promise<void> | null = null;

export function ensureSchema(): Promise<void> {
  if (!schemaReady) {
    schemaReady = createSchema().catch((e: unknown) => {
      schemaReady = null;
      console.warn('ensureSchema: storage setup failed:', e instanceof Error ? e.message : e);
      throw e;
    });
  }
  return schemaReady;
}

async function createSchema(): Promise<void> {
  if (DB_URL) {
    const p = getPool();
    await p.query(`
      CREATE TABLE IF NOT EXISTS config_plugins (
        plugin text NOT NULL,
        name text NOT NULL,
        value text NOT NULL,
        PRIMARY KEY (plugin, name)
      );
      CREATE TABLE IF NOT EXISTS user_preferences (
        user_id integer NOT NULL,
        name text NOT NULL,
        value text NOT NULL,
        PRIMARY KEY (user_id, name)
      );
      CREATE TABLE IF NOT EXISTS courses (
        id integer PRIMARY KEY,
        fullname text NOT NULL,
        context_id integer NOT NULL,
        base_colour text,
        completion_enabled boolean NOT NULL DEFAULT false
      );
      CREATE TABLE IF NOT EXISTS course_modules (
        id integer PRIMARY KEY,
        course_id integer NOT NULL REFERENCES courses(id) ON DELETE CASCADE,
        instance integer NOT NULL,
        modname text NOT NULL,
        name text NOT NULL,
        section_id integer NOT NULL,
        section_number integer NOT NULL,
        context_id integer NOT NULL,
        visible boolean NOT NULL DEFAULT true,
        completion integer NOT NULL DEFAULT 0
      );
      CREATE TABLE IF NOT EXISTS course_modules_completion (
        user_id integer NOT NULL,
        cmid integer NOT NULL REFERENCES course_modules(id) ON DELETE CASCADE,
        state integer NOT NULL,
        PRIMARY KEY (user_id, cmid)
      );
      CREATE TABLE IF NOT EXISTS user_capabilities (
        user_id integer NOT NULL,
        context_id integer NOT NULL,
        capability text NOT NULL,
        PRIMARY KEY (user_id, context_id, capability)
      );
      CREATE TABLE IF NOT EXISTS files (
        id serial PRIMARY KEY,
        context_id integer NOT NULL,
        component text NOT NULL,
        filearea text NOT NULL,
        item_id integer NOT NULL DEFAULT 0,
        filepath text NOT NULL DEFAULT '/',
        filename text NOT NULL,
        filesize bigint NOT NULL DEFAULT 0,
        mimetype text
      );
      CREATE INDEX IF NOT EXISTS files_area_idx ON files (context_id, component, filearea);
      CREATE TABLE IF NOT EXISTS url (
        id integer PRIMARY KEY,
        external_url text NOT NULL,
        display integer NOT NULL DEFAULT 0
      );
      CREATE TABLE IF NOT EXISTS module_content (
        modname text NOT NULL,
        instance integer NOT NULL,
        intro text,
        content text,
        content_format integer NOT NULL DEFAULT 1,
        revision integer,
        PRIMARY KEY (modname, instance)
      );
    `);
  }
  await installDefaultSettings(createConfigStore());
}

// Config

export function createConfigStore(): ConfigStore {
  return {
    async get(component, name) {
      if (DB_URL) {
        const res = await getPool().query<{ value: string }>(`SELECT value FROM config_plugins WHERE plugin=$1 AND name=$2`, [component, name]);
        return res.rows[0]?.value ?? null;
      }
      const db = await readJson();
      return db.config[component]?.[name] ?? null;
    },
    async set(component, name, value) {
      if (DB_URL) {
        if (value === null) {
          await getPool().query(`DELETE FROM config_plugins WHERE plugin=$1 AND name=$2`, [component, name]);
          return;
        }
        await getPool().query(`INSERT INTO config_plugins(plugin, name, value) VALUES ($1,$2,$3)
                               ON CONFLICT (plugin, name) DO UPDATE SET value = EXCLUDED.value`, [component, name, value]);
        return;
      }
      const db = await readJson();
      const section = { ...(db.config[component] || {}) };
      if (value === null) delete section[name];
      else section[name] = value;
      db.config[component] = section;
      await writeJson(db);
    },
  };
}

// User preferences

export function createPreferenceStore(user: RequestUser): PreferenceStore {
  return {
    async get(name) {
      if (DB_URL) {
        const res = await getPool().query<{ value: string }>(`SELECT value FROM user_preferences WHERE user_id=$1 AND name=$2`, [user.id, name]);
        return res.rows[0]?.value ?? null;
      }
      const db = await readJson();
      return db.preferences[String(user.id)]?.[name] ?? null;
    },
    async set(name, value) {
      // Guests share one account; their preferences are never stored
      if (user.isGuest) return;
      if (DB_URL) {
        if (value === null) {
          await getPool().query(`DELETE FROM user_preferences WHERE user_id=$1 AND name=$2`, [user.id, name]);
          return;
        }
        await getPool().query(`INSERT INTO user_preferences(user_id, name, value) VALUES ($1,$2,$3)
                               ON CONFLICT (user_id, name) DO UPDATE SET value = EXCLUDED.value`, [user.id, name, value]);
        return;
      }
      const db = await readJson();
      const key = String(user.id);
      const prefs = { ...(db.preferences[key] || {}) };
      if (value === null) delete prefs[name];
      else prefs[name] = value;
      db.preferences[key] = prefs;
      await writeJson(db);
    },
  };
}

// Courses and modules

type CourseRow = { id: number; fullname: string; context_id: number; base_colour: string | null; completion_enabled: boolean };
type ModuleRow = {
  id: number; course_id: number; instance: number; modname: string; name: string;
  section_id: number; section_number: number; context_id: number; visible: boolean; completion: number;
};
type ContentRow = { intro: string | null; content: string | null; content_format: number; revision: number | null };

export function createCourseCatalog(user: RequestUser): CourseCatalog {
  return {
    async getCourse(courseId): Promise<CourseRecord | null> {
      if (DB_URL) {
        const res = await getPool().query<CourseRow>(`SELECT id, fullname, context_id, base_colour, completion_enabled FROM courses WHERE id=$1`, [courseId]);
        const r = res.rows[0];
        if (!r) return null;
        return courseSchema.parse({ id: r.id, fullname: r.fullname, contextId: r.context_id, baseColour: r.base_colour, completionEnabled: r.completion_enabled });
      }
      const db = await readJson();
      return db.courses.find(c => c.id === courseId) ?? null;
    },
    async getCourseModule(courseId, cmid): Promise<CourseModuleRecord | null> {
      if (DB_URL) {
        const res = await getPool().query<ModuleRow>(
          `SELECT id, course_id, instance, modname, name, section_id, section_number, context_id, visible, completion
             FROM course_modules WHERE id=$1 AND course_id=$2`, [cmid, courseId]);
        const r = res.rows[0];
        if (!r) return null;
        return moduleSchema.parse({
          id: r.id, courseId: r.course_id, instance: r.instance, modname: r.modname, name: r.name,
          sectionId: r.section_id, sectionNumber: r.section_number, contextId: r.context_id, visible: r.visible, completion: r.completion,
        });
      }
      const db = await readJson();
      return db.modules.find(m => m.id === cmid && m.courseId === courseId) ?? null;
    },
    async hasCapability(capability, contextId) {
      if (DB_URL) {
        const res = await getPool().query(`SELECT 1 FROM user_capabilities WHERE user_id=$1 AND context_id=$2 AND capability=$3`, [user.id, contextId, capability]);
        return (res.rowCount ?? 0) > 0;
      }
      const db = await readJson();
      return db.capabilities.some(c => c.userId === user.id && c.contextId === contextId && c.capability === capability);
    },
    async getCompletionState(cmid) {
      if (DB_URL) {
        const res = await getPool().query<{ state: number }>(`SELECT state FROM course_modules_completion WHERE user_id=$1 AND cmid=$2`, [user.id, cmid]);
        return res.rows[0]?.state ?? null;
      }
      const db = await readJson();
      return db.completions.find(c => c.userId === user.id && c.cmid === cmid)?.state ?? null;
    },
    async getUrlRecord(instance): Promise<UrlRecord | null> {
      if (DB_URL) {
        const res = await getPool().query<{ id: number; external_url: string; display: number }>(`SELECT id, external_url, display FROM url WHERE id=$1`, [instance]);
        const r = res.rows[0];
        return r ? urlSchema.parse({ id: r.id, externalUrl: r.external_url, display: r.display }) : null;
      }
      const db = await readJson();
      return db.urls.find(u => u.id === instance) ?? null;
    },
    async getContentRecord(modname, instance): Promise<ContentRecord | null> {
      if (DB_URL) {
        const res = await getPool().query<ContentRow>(`SELECT intro, content, content_format, revision FROM module_content WHERE modname=$1 AND instance=$2`, [modname, instance]);
        const r = res.rows[0];
        return r ? contentSchema.parse({ intro: r.intro, content: r.content, contentFormat: r.content_format, revision: r.revision }) : null;
      }
      const db = await readJson();
      const found = db.contents.find(c => c.modname === modname && c.instance === instance);
      if (!found) return null;
      return { intro: found.intro, content: found.content, contentFormat: found.contentFormat, revision: found.revision };
    },
  };
}

// Files

type FileRow = {
  context_id: number; component: string; filearea: string; item_id: number;
  filepath: string; filename: string; filesize: string | number; mimetype: string | null;
};

export function createFileStorage(): FileStorage {
  return {
    async getAreaFiles(contextId, component, filearea): Promise<StoredFile[]> {
      if (DB_URL) {
        const res = await getPool().query<FileRow>(
          `SELECT context_id, component, filearea, item_id, filepath, filename, filesize, mimetype
             FROM files WHERE context_id=$1 AND component=$2 AND filearea=$3
            ORDER BY item_id, filepath, filename`, [contextId, component, filearea]);
        return res.rows.map(r => ({
          contextId: r.context_id,
          component: r.component,
          filearea: r.filearea,
          itemId: r.item_id,
          filepath: r.filepath,
          filename: r.filename,
          filesize: Number(r.filesize) || 0, // bigint arrives as text
          mimetype: r.mimetype,
        }));
      }
      const db = await readJson();
      return db.files.filter(f => f.contextId === contextId && f.component === component && f.filearea === filearea);
    },
  };
}
