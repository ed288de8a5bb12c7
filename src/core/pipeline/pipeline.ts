/**
 * The compose/review pipeline: load → inject for prompts, load → validate for
 * artifacts. Each call is independent; only the template file cache is shared.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import { getDefaultConfig } from '../config/loader.js';
import { TemplateLoader } from '../templates/loader.js';
import { FileTemplateSource, LayeredTemplateSource } from '../templates/sources.js';
import type { ResolvedTemplate, TemplateListing, TemplateSource } from '../templates/types.js';
import { ContextInjector } from '../context/injector.js';
import type { Composition, ContextValues } from '../context/types.js';
import { ChecklistLoader, type ChecklistDirectory } from '../checklists/loader.js';
import type { Artifact, Checklist, ChecklistListing, PredicateMap } from '../checklists/types.js';
import { ChecklistValidator, createArtifact } from '../validation/validator.js';
import type { ReviewReport } from '../validation/types.js';
import { getBuiltinChecklistsDir, getBuiltinTemplatesDir } from './library.js';
import { logger } from '../../utils/logger.js';

export interface PipelineOptions {
  /** Override the template source (defaults to project dir + built-in library) */
  templateSource?: TemplateSource;
  /** Override checklist directories */
  checklistDirectories?: ChecklistDirectory[];
}

export interface TemplateSummary extends TemplateListing {
  description?: string;
  inputs: string[];
  /** Set when the template fails to resolve */
  error?: string;
}

export interface ChecklistSummary extends ChecklistListing {
  description?: string;
  items: number;
}

export class Pipeline {
  readonly templates: TemplateLoader;
  readonly checklists: ChecklistLoader;
  private readonly source: TemplateSource;
  private readonly injector: ContextInjector;
  private readonly validator: ChecklistValidator;
  private readonly log = logger.child('pipeline');

  constructor(
    readonly projectRoot: string,
    readonly config: Config = getDefaultConfig(),
    options: PipelineOptions = {}
  ) {
    this.source = options.templateSource ?? this.defaultTemplateSource();
    this.templates = new TemplateLoader(this.source, {
      maxDepth: config.templates.max_depth,
      extension: config.templates.extension,
    });
    this.injector = new ContextInjector({ unknownKeys: config.context.unknown_keys });
    this.checklists = new ChecklistLoader(options.checklistDirectories ?? this.defaultChecklistDirectories());
    this.validator = new ChecklistValidator({
      blockingSeverities: config.review.blocking_severities,
      errorsBlock: config.review.errors_block,
    });
  }

  private defaultTemplateSource(): TemplateSource {
    const { dir, extension, use_builtin } = this.config.templates;
    const sources: TemplateSource[] = [
      new FileTemplateSource(path.resolve(this.projectRoot, dir), 'project', extension),
    ];
    if (use_builtin) {
      sources.push(new FileTemplateSource(getBuiltinTemplatesDir(), 'builtin', extension));
    }
    return new LayeredTemplateSource(sources);
  }

  private defaultChecklistDirectories(): ChecklistDirectory[] {
    const { dir, use_builtin } = this.config.checklists;
    const dirs: ChecklistDirectory[] = [{ dir: path.resolve(this.projectRoot, dir), origin: 'project' }];
    if (use_builtin) {
      dirs.push({ dir: getBuiltinChecklistsDir(), origin: 'builtin' });
    }
    return dirs;
  }

  /**
   * Resolve a template and bind its insertion points.
   */
  async compose(templateName: string, context: ContextValues): Promise<Composition> {
    const template = await this.templates.load(templateName);
    return this.injector.inject(template, context);
  }

  async resolve(templateName: string): Promise<ResolvedTemplate> {
    return this.templates.load(templateName);
  }

  /**
   * Review an artifact against a named checklist.
   */
  async review(
    artifact: Artifact | string,
    checklistName: string,
    predicates?: PredicateMap
  ): Promise<ReviewReport> {
    const checklist = await this.checklists.load(checklistName);
    return this.reviewWith(artifact, checklist, predicates);
  }

  reviewWith(artifact: Artifact | string, checklist: Checklist, predicates?: PredicateMap): ReviewReport {
    const subject = typeof artifact === 'string' ? createArtifact(artifact) : artifact;
    return this.validator.validate(subject, checklist, predicates);
  }

  /**
   * Available templates with their description and insertion points.
   * A template that fails to resolve is listed with its error.
   */
  async listTemplates(): Promise<TemplateSummary[]> {
    const summaries: TemplateSummary[] = [];
    for (const listing of await this.source.list()) {
      let template: ResolvedTemplate;
      try {
        template = await this.templates.load(listing.name);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log.debug(`Cannot resolve ${listing.name}`, { error: message });
        summaries.push({ ...listing, inputs: [], error: message });
        continue;
      }
      summaries.push({
        ...listing,
        description: template.description,
        inputs: template.insertionPoints,
      });
    }
    return summaries;
  }

  async listChecklists(): Promise<ChecklistSummary[]> {
    const summaries: ChecklistSummary[] = [];
    for (const listing of await this.checklists.list()) {
      const checklist = await this.checklists.load(listing.name);
      summaries.push({
        ...listing,
        description: checklist.description,
        items: checklist.items.length,
      });
    }
    return summaries;
  }
}
