/**
 * Scope policy
 *
 * A policy is an ordered, immutable list of scopes, highest precedence
 * first. Precedence is exactly that order. Every policy ends with one
 * terminal, read-only defaults scope.
 *
 * Policies are values: `withScopes`, `reorder` and `clone` return new
 * policies. The process-wide default lives in an explicit PolicyHandle;
 * engines capture the policy they were built with, so replacing the
 * default never changes an engine that already exists.
 *
 * Set SIGIL_POLICY=user_over_project to let user settings beat project
 * settings in the built-in policy.
 */

import path from 'node:path'
import type { PolicyMode, Scope, ScopeContext, ScopeInput } from '../types.js'
import { InvalidPolicyError, UnknownScopeError } from './errors.js'
import { projectConfigDir } from './paths.js'

export const ENV_SCOPE = 'env'
export const DEFAULT_SCOPE = 'default'

export const DEFAULT_POLICY_MODE: PolicyMode = 'project_over_user'

// =============================================================================
// Scopes
// =============================================================================

const noFile = (): null => null

/**
 * Build a frozen scope. File scopes need a resolver; overlay scopes never
 * resolve to a file.
 */
export function defineScope(input: ScopeInput): Scope {
  const kind = input.kind ?? 'file'
  const id = input.id.trim()

  if (!id) {
    throw new InvalidPolicyError('scope id must not be empty')
  }
  if (kind === 'file' && !input.resolve) {
    throw new InvalidPolicyError(`file scope "${id}" needs a path resolver`)
  }

  return Object.freeze({
    id,
    writable: input.writable ?? false,
    machineAffinity: input.machineAffinity ?? false,
    kind,
    terminal: input.terminal ?? false,
    resolve: kind === 'overlay' ? noFile : input.resolve ?? noFile
  })
}

/**
 * `settings.ini` → `settings-local-<host>.ini`
 */
export function applyHostSuffix(filePath: string, host: string): string {
  const ext = path.extname(filePath)
  const stem = filePath.slice(0, filePath.length - ext.length)
  return `${stem}-local-${host}${ext}`
}

const userSettingsPath = (ctx: ScopeContext): string =>
  path.join(ctx.userConfigDir, ctx.providerId, ctx.settingsFilename)

const projectSettingsPath = (ctx: ScopeContext): string =>
  path.join(projectConfigDir(ctx.projectRoot), ctx.settingsFilename)

export const BUILTIN_SCOPES = {
  env: defineScope({ id: ENV_SCOPE, kind: 'overlay' }),
  projectLocal: defineScope({ id: 'project-local', writable: true, machineAffinity: true, resolve: projectSettingsPath }),
  project: defineScope({ id: 'project', writable: true, resolve: projectSettingsPath }),
  userLocal: defineScope({ id: 'user-local', writable: true, machineAffinity: true, resolve: userSettingsPath }),
  user: defineScope({ id: 'user', writable: true, resolve: userSettingsPath }),
  defaults: defineScope({ id: DEFAULT_SCOPE, terminal: true, resolve: ctx => ctx.defaultsPath })
} as const

// =============================================================================
// Policy
// =============================================================================

export interface WithScopesOptions {
  /** Insert the added scopes before this scope id (default: the terminal scope) */
  before?: string
}

export class ScopePolicy {
  private readonly ordered: readonly Scope[]
  private readonly byId: ReadonlyMap<string, Scope>

  constructor(scopes: Iterable<Scope | ScopeInput>) {
    const ordered = [...scopes].map(scope => defineScope(scope))
    const byId = new Map<string, Scope>()

    if (ordered.length === 0) {
      throw new InvalidPolicyError('at least one scope is required')
    }

    for (const scope of ordered) {
      if (byId.has(scope.id)) {
        throw new InvalidPolicyError(`duplicate scope id "${scope.id}"`)
      }
      if (scope.kind === 'overlay' && scope.writable) {
        throw new InvalidPolicyError(`overlay scope "${scope.id}" cannot be writable`)
      }
      byId.set(scope.id, scope)
    }

    const terminals = ordered.filter(scope => scope.terminal)
    if (terminals.length !== 1) {
      throw new InvalidPolicyError(`exactly one terminal defaults scope is required, found ${terminals.length}`)
    }
    if (terminals[0].writable) {
      throw new InvalidPolicyError(`terminal scope "${terminals[0].id}" must be read-only`)
    }
    if (ordered[ordered.length - 1] !== terminals[0]) {
      throw new InvalidPolicyError(`terminal scope "${terminals[0].id}" must have the lowest precedence`)
    }

    this.ordered = Object.freeze(ordered)
    this.byId = byId
  }

  /**
   * Scopes in precedence order, highest first
   */
  scopes(): readonly Scope[] {
    return this.ordered
  }

  scopeIds(): string[] {
    return this.ordered.map(scope => scope.id)
  }

  has(scopeId: string): boolean {
    return this.byId.has(scopeId)
  }

  getScope(scopeId: string): Scope {
    const scope = this.byId.get(scopeId)
    if (!scope) {
      throw new UnknownScopeError(scopeId, this.scopeIds())
    }
    return scope
  }

  canWrite(scopeId: string): boolean {
    return this.getScope(scopeId).writable
  }

  terminalScope(): Scope {
    return this.ordered[this.ordered.length - 1]
  }

  machineScopes(): string[] {
    return this.ordered.filter(scope => scope.machineAffinity).map(scope => scope.id)
  }

  /**
   * File path for a scope, or null for overlays and scopes with nothing to
   * load (e.g. no defaults file was discovered)
   */
  resolvePath(scopeId: string, ctx: ScopeContext): string | null {
    const scope = this.getScope(scopeId)
    const resolved = scope.resolve(ctx)
    if (resolved === null) return null
    return scope.machineAffinity ? applyHostSuffix(resolved, ctx.host) : resolved
  }

  withScopes(
    added: Array<Scope | ScopeInput>,
    removedIds: string[] = [],
    options: WithScopesOptions = {}
  ): ScopePolicy {
    for (const id of removedIds) {
      this.getScope(id)
    }

    const kept = this.ordered.filter(scope => !removedIds.includes(scope.id))
    const anchorId = options.before ?? kept.find(scope => scope.terminal)?.id
    const anchor = anchorId === undefined ? -1 : kept.findIndex(scope => scope.id === anchorId)

    if (options.before !== undefined && anchor === -1) {
      throw new UnknownScopeError(options.before, kept.map(scope => scope.id))
    }

    const at = anchor === -1 ? kept.length : anchor
    return new ScopePolicy([...kept.slice(0, at), ...added, ...kept.slice(at)])
  }

  /**
   * Same scopes in a new order; `ids` must name every scope exactly once
   */
  reorder(ids: string[]): ScopePolicy {
    if (ids.length !== this.ordered.length || new Set(ids).size !== ids.length) {
      throw new InvalidPolicyError(`reorder must list each of ${this.scopeIds().join(', ')} exactly once`)
    }
    return new ScopePolicy(ids.map(id => this.getScope(id)))
  }

  clone(): ScopePolicy {
    return new ScopePolicy(this.ordered)
  }
}

// =============================================================================
// Built-in policies
// =============================================================================

/**
 * Parse a policy mode, accepting a few spellings.
 * Returns null for anything unrecognised.
 */
export function parsePolicyMode(raw: string | undefined | null): PolicyMode | null {
  if (!raw) return null
  const normalized = raw.toLowerCase().trim().replace(/-/g, '_')
  if (normalized === 'project_over_user' || normalized === 'project') return 'project_over_user'
  if (normalized === 'user_over_project' || normalized === 'user') return 'user_over_project'
  return null
}

export function createDefaultPolicy(mode: PolicyMode = DEFAULT_POLICY_MODE): ScopePolicy {
  const s = BUILTIN_SCOPES
  const middle = mode === 'user_over_project'
    ? [s.userLocal, s.user, s.projectLocal, s.project]
    : [s.projectLocal, s.project, s.userLocal, s.user]
  return new ScopePolicy([s.env, ...middle, s.defaults])
}

/**
 * Explicit, replaceable holder for a "current" policy
 */
export class PolicyHandle {
  private current: ScopePolicy

  constructor(initial: ScopePolicy) {
    this.current = initial
  }

  get(): ScopePolicy {
    return this.current
  }

  /**
   * Install a new policy and return the previous one
   */
  replace(next: ScopePolicy): ScopePolicy {
    const previous = this.current
    this.current = next
    return previous
  }
}

export const defaultPolicy = new PolicyHandle(
  createDefaultPolicy(parsePolicyMode(process.env.SIGIL_POLICY) ?? DEFAULT_POLICY_MODE)
)
