export { MetricNamesError } from './errors';
export { DEFAULT_METRIC_NAMES_PATH, loadMetricNames, metricDisplayName } from './metricNames';
export type { MetricNames } from './metricNames';
export { DEFAULT_SITE_NAME, buildNav, buildSiteConfig, writeSiteConfig } from './siteConfig';
export type { NavEntry, SiteConfigOptions } from './siteConfig';
export { TEMPLATES_DIR, createTemplateEngine, hardwareSummary, htmlAttribute, tableCell } from './templates';
export type { TemplateEngineOptions } from './templates';
export { eventPageContext, hardwareSections, renderSite } from './render';
export type { EvaluationResultRow, EventPageContext, RenderSiteOptions, RenderSiteResult } from './render';
