import type { ExportOptions, IdSelection } from '@/lib/exports/options';
import { includeSection } from '@/lib/exports/options';
import type { ProjectData } from '@/lib/exports/schema';

function select<T extends { id: string }>(items: T[], ids: IdSelection): T[] {
  if (ids === 'all') return items;
  const wanted = new Set(ids);
  return items.filter((item) => wanted.has(item.id));
}

/**
 * Applies section flags and id allow-lists. Excluded sections come back empty;
 * localization keeps only the requested locales.
 */
export function filterProject(project: ProjectData, options: ExportOptions): ProjectData {
  const languages = options.languages;
  const keepLocale = (locale: string) => languages === 'all' || languages.includes(locale);

  return {
    project: project.project,
    sheets: includeSection(options, 'sheets') ? select(project.sheets, options.sheet_ids) : [],
    flows: includeSection(options, 'flows') ? select(project.flows, options.flow_ids) : [],
    scenes: includeSection(options, 'scenes') ? select(project.scenes, options.scene_ids) : [],
    screenplays: includeSection(options, 'screenplays') ? project.screenplays : [],
    localization: includeSection(options, 'localization')
      ? {
          languages: project.localization.languages.filter((lang) => lang.is_source || keepLocale(lang.locale_code)),
          strings: project.localization.strings.filter((text) => keepLocale(text.locale_code)),
          glossary: project.localization.glossary.filter((entry) => keepLocale(entry.target_locale))
        }
      : { languages: [], strings: [], glossary: [] },
    assets: includeSection(options, 'assets') ? project.assets : []
  };
}
