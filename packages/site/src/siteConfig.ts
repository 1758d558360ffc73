import { writeFile } from 'node:fs/promises';
import { stringify as stringifyYaml } from 'yaml';
import type { Instrument } from '@scopeledger/ledger';

export const DEFAULT_SITE_NAME = 'Microscopy Dashboard';

export type NavEntry = { [title: string]: string | NavEntry[] };

export type SiteConfigOptions = {
  siteName?: string;
  siteUrl?: string;
  /** Docs directory as mkdocs sees it, relative to the config file. */
  docsDir: string;
  instruments: readonly Pick<Instrument, 'id' | 'display_name'>[];
};

/** Fleet pages first, then one entry per instrument ordered by display name. */
export function buildNav(instruments: SiteConfigOptions['instruments']): NavEntry[] {
  const microscopes = [...instruments]
    .sort((a, b) => {
      const left = a.display_name.toLowerCase();
      const right = b.display_name.toLowerCase();
      return left === right ? 0 : left < right ? -1 : 1;
    })
    .map((instrument): NavEntry => ({ [instrument.display_name]: `instruments/${instrument.id}/index.md` }));

  return [{ 'Fleet Overview': 'index.md' }, { 'System Health': 'status.md' }, { Microscopes: microscopes }];
}

export function buildSiteConfig(options: SiteConfigOptions): Record<string, unknown> {
  return {
    site_name: options.siteName ?? DEFAULT_SITE_NAME,
    ...(options.siteUrl ? { site_url: options.siteUrl } : {}),
    docs_dir: options.docsDir,
    use_directory_urls: true,
    theme: {
      name: 'material',
      logo: 'assets/images/logo.svg',
      favicon: 'assets/images/favicon.svg',
      features: [
        'navigation.tabs',
        'navigation.sections',
        'navigation.top',
        'toc.integrate',
        'search.suggest',
        'search.highlight',
        'content.code.copy'
      ],
      palette: [
        { scheme: 'default', toggle: { icon: 'material/brightness-7', name: 'Switch to dark mode' } },
        { scheme: 'slate', toggle: { icon: 'material/brightness-4', name: 'Switch to light mode' } }
      ]
    },
    markdown_extensions: [
      'attr_list',
      'md_in_html',
      'pymdownx.details',
      'pymdownx.superfences',
      { 'pymdownx.tabbed': { alternate_style: true } }
    ],
    plugins: ['search'],
    extra_css: ['assets/stylesheets/dashboard.css'],
    extra_javascript: [
      'https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js',
      'assets/javascripts/charts.js',
      'assets/javascripts/dashboard.js'
    ],
    nav: buildNav(options.instruments)
  };
}

export async function writeSiteConfig(filePath: string, options: SiteConfigOptions): Promise<void> {
  await writeFile(filePath, stringifyYaml(buildSiteConfig(options)), 'utf8');
}
