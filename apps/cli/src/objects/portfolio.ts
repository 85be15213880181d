/**
 * Portfolios
 * A portfolio tree is held in a hierarchy arena: standard sub-portfolios are
 * owned children, portfolios included by reference are reference children.
 */

import type {
  AuditProblem,
  MeasuresResponse,
  PermissionsExport,
  PortfolioExport,
  PortfolioSearchResponse,
  PortfolioShowData,
  Visibility,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext } from '../audit/settings';
import { HierarchyArena } from '../hierarchy/arena';
import { createLogger } from '../logger';
import { Platform, PORTFOLIO_EDITIONS } from '../platform/platform';
import { auditAdminPermission, getPermissions, hasPermissions } from './permissions';
import { isVisibility } from './project';
import { createRemote, onLiveObject } from './remote';
import { selectionFromShow, selectionToExport, SelectionModeEngine } from './selection-mode';
import { RemoteObject } from './types';

const log = createLogger({ component: 'portfolio' });

export type PortfolioTree = HierarchyArena<PortfolioShowData>;

/**
 * Key of the portfolio a sub view refers to, for by-reference inclusions
 */
function referencedKey(view: PortfolioShowData): string | undefined {
  if (view.qualifier === 'VW') return view.originalKey ?? view.key;
  return undefined;
}

/**
 * Build the arena of a portfolio and all its sub views
 */
export function buildPortfolioTree(root: PortfolioShowData): PortfolioTree {
  const arena: PortfolioTree = new HierarchyArena();
  const visit = (view: PortfolioShowData): void => {
    arena.add(view.key, view);
    for (const sub of view.subViews ?? []) {
      const reference = referencedKey(sub);
      if (reference !== undefined) {
        if (!arena.has(reference)) arena.add(reference, { key: reference, name: sub.name });
        arena.link(view.key, reference, 'reference');
      } else if (sub.qualifier === 'SVW') {
        visit(sub);
        arena.link(view.key, sub.key, 'owned');
      } else {
        log.debug(`Ignoring ${sub.qualifier ?? 'unknown'} component '${sub.key}' of portfolio '${view.key}'`);
      }
    }
  };
  visit(root);
  return arena;
}

/**
 * Export one node of a portfolio tree with its owned descendants
 */
export function exportPortfolioNode(tree: PortfolioTree, key: string, isRoot = true): PortfolioExport {
  const view = tree.get(key);
  if (!view) return {};
  const data: PortfolioExport = { name: view.name };
  if (view.desc) data.description = view.desc;
  if (isRoot && isVisibility(view.visibility)) data.visibility = view.visibility;
  data.selection = selectionToExport(selectionFromShow(view));
  const children = tree.childrenOf(key);
  if (children.length > 0) {
    data.subPortfolios = Object.fromEntries(
      children.map((edge) => [
        edge.child,
        edge.kind === 'reference' ? { byReference: true } : exportPortfolioNode(tree, edge.child, false),
      ])
    );
  }
  return data;
}

export class Portfolio implements RemoteObject<PortfolioShowData> {
  readonly kind = 'portfolio' as const;
  private engine?: SelectionModeEngine;
  private loaded = false;

  constructor(readonly platform: Platform, public payload: PortfolioShowData) {}

  get key(): string {
    return this.payload.key;
  }

  get name(): string {
    return this.payload.name;
  }

  cacheFields(): string[] {
    return [this.key];
  }

  url(): string {
    return this.platform.pageUrl(`portfolio?id=${encodeURIComponent(this.key)}`);
  }

  toString(): string {
    return `portfolio '${this.key}'`;
  }

  /** Full definition, sub views included */
  async show(signal?: AbortSignal): Promise<PortfolioShowData> {
    if (!this.loaded) {
      this.payload = await onLiveObject(this, () =>
        this.platform.getJson<PortfolioShowData>('views/show', { key: this.key }, signal)
      );
      this.loaded = true;
      this.engine = undefined;
    }
    return this.payload;
  }

  get selection(): SelectionModeEngine {
    if (!this.engine) {
      const initial = this.loaded ? selectionFromShow(this.payload) : undefined;
      this.engine = new SelectionModeEngine(this.platform, this.key, initial);
    }
    return this.engine;
  }

  async tree(signal?: AbortSignal): Promise<PortfolioTree> {
    return buildPortfolioTree(await this.show(signal));
  }

  /** Number of projects aggregated by the portfolio */
  async projectCount(signal?: AbortSignal): Promise<number> {
    const data = await onLiveObject(this, () =>
      this.platform.getJson<MeasuresResponse>('measures/component', { component: this.key, metricKeys: 'projects' }, signal)
    );
    const measure = data.component.measures.find((m) => m.metric === 'projects');
    return Number(measure?.value ?? 0);
  }

  async audit(context: AuditContext): Promise<AuditProblem[]> {
    const { settings, signal } = context;
    const problems = auditAdminPermission(this, await this.permissions(signal), settings);
    const count = await this.projectCount(signal);
    if (count === 0 && settings.boolean('audit.portfolios.empty')) {
      problems.push(createProblem('PORTFOLIO_EMPTY', this));
    } else if (count === 1 && settings.boolean('audit.portfolios.singleton')) {
      problems.push(createProblem('PORTFOLIO_SINGLETON', this));
    }
    return problems;
  }

  permissions(signal?: AbortSignal): Promise<PermissionsExport> {
    return getPermissions(this.platform, this.key, signal);
  }

  async toExport(signal?: AbortSignal): Promise<PortfolioExport> {
    const exported = exportPortfolioNode(await this.tree(signal), this.key);
    const permissions = await this.permissions(signal);
    if (hasPermissions(permissions)) exported.permissions = permissions;
    return exported;
  }

  /** @returns whether the name or description changed */
  async update(name: string, description: string | undefined, signal?: AbortSignal): Promise<boolean> {
    if (name === this.payload.name && (description ?? '') === (this.payload.desc ?? '')) return false;
    await this.platform.post('views/update', { key: this.key, name, description }, signal);
    this.payload = { ...this.payload, name, desc: description };
    return true;
  }

  /**
   * Include another top level portfolio by reference
   * @returns false when the reference already existed
   */
  async addReference(referenceKey: string, signal?: AbortSignal): Promise<boolean> {
    const tree = await this.tree(signal);
    if (tree.childrenOf(this.key).some((edge) => edge.kind === 'reference' && edge.child === referenceKey)) {
      return false;
    }
    await this.platform.post('views/add_portfolio', { portfolio: this.key, reference: referenceKey }, signal);
    this.loaded = false;
    return true;
  }

  /** Queue the recomputation of the portfolio */
  async recompute(signal?: AbortSignal): Promise<void> {
    await this.platform.post('views/refresh', { key: this.key }, signal);
  }
}

function cachePortfolio(platform: Platform, data: PortfolioShowData): Portfolio {
  return platform.cache.upsert(
    'portfolio',
    [data.key],
    () => new Portfolio(platform, data),
    (portfolio) => {
      portfolio.payload = { ...portfolio.payload, ...data };
    }
  );
}

/**
 * Top level portfolios
 * @throws UnsupportedOperationError on editions without portfolios
 */
export async function listPortfolios(platform: Platform, signal?: AbortSignal): Promise<Portfolio[]> {
  await platform.requireEdition('Portfolios', PORTFOLIO_EDITIONS);
  const views = await platform.searchAll<PortfolioSearchResponse, PortfolioSearchResponse['components'][number]>(
    'views/search',
    { qualifiers: 'VW' },
    (page) => ({ items: page.components, paging: page.paging }),
    signal
  );
  return views.map((view) => cachePortfolio(platform, view));
}

export async function getPortfolio(platform: Platform, key: string, signal?: AbortSignal): Promise<Portfolio> {
  return platform.cache.getOrCreate('portfolio', [key], async (buildSignal) => {
    const portfolio = new Portfolio(platform, { key, name: key });
    await portfolio.show(buildSignal);
    return portfolio;
  }, signal);
}

export interface PortfolioCreation {
  name: string;
  description?: string;
  visibility?: Visibility;
  /** Owning portfolio, for a standard sub-portfolio */
  parentKey?: string;
}

export async function createPortfolio(
  platform: Platform,
  key: string,
  options: PortfolioCreation,
  signal?: AbortSignal
): Promise<Portfolio> {
  await createRemote(key, () =>
    platform.post(
      'views/create',
      {
        key,
        name: options.name,
        description: options.description,
        visibility: options.visibility,
        parent: options.parentKey,
      },
      signal
    )
  );
  return getPortfolio(platform, key, signal);
}
