/**
 * Tests for the resolution engine
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { SigilEngine, createEngine, type EngineOptions } from '../src/engine.js'
import { iniBackend } from '../src/backends/index.js'
import {
  BUILTIN_SCOPES,
  ScopePolicy,
  createDefaultPolicy,
  defaultPolicy
} from '../src/lib/scope-policy.js'
import { createEnvReader, envVarName } from '../src/lib/env-overlay.js'
import { autoCast, casts } from '../src/lib/cast.js'
import { linkDefaults } from '../src/lib/dev-links.js'
import { SecretChain } from '../src/secrets/chain.js'
import { KeyringProvider } from '../src/secrets/keyring.js'
import { EnvSecretProvider } from '../src/secrets/env.js'
import {
  CastError,
  CorruptFileError,
  InvalidKeyError,
  InvalidPolicyError,
  NotWritableError,
  SecretNotWritableError,
  UnknownScopeError,
  UnsupportedFormatError
} from '../src/lib/errors.js'
import { setSilent } from '../src/lib/logger.js'
import type { ChangeEvent, Mapping } from '../src/types.js'
import { MemoryKeyring, unavailableKeyring } from './secrets/memory-keyring.js'

describe('SigilEngine', () => {
  let tempDir: string
  let configDir: string
  let projectRoot: string
  let defaultsFile: string
  let env: NodeJS.ProcessEnv

  const makeEngine = (overrides: Partial<EngineOptions> = {}): SigilEngine =>
    new SigilEngine({
      providerId: 'demo',
      userConfigDir: configDir,
      projectRoot,
      defaultsPath: defaultsFile,
      host: 'testhost',
      envReader: createEnvReader(env),
      ...overrides
    })

  const writeDefaults = (content: string): void => {
    fs.mkdirSync(path.dirname(defaultsFile), { recursive: true })
    fs.writeFileSync(defaultsFile, content)
  }

  const userFile = (): string => path.join(configDir, 'demo', 'settings.ini')
  const projectFile = (): string => path.join(projectRoot, '.sigil', 'settings.ini')

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sigil-engine-test-'))
    configDir = path.join(tempDir, 'config')
    projectRoot = path.join(tempDir, 'project')
    defaultsFile = path.join(tempDir, 'pkg', '.sigil', 'settings.ini')
    env = {}
    setSilent(true)
  })

  afterEach(() => {
    setSilent(false)
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('get', () => {
    it('should override a default from the user scope and fall back after clear', () => {
      const { env: envScope, project, user, defaults } = BUILTIN_SCOPES
      writeDefaults('[db]\nport = 5432\n')
      const engine = makeEngine({ policy: new ScopePolicy([envScope, project, user, defaults]) })

      expect(engine.get('db.port')).toBe(5432)

      engine.set('db.port', 6000, 'user')
      expect(engine.get('db.port')).toBe(6000)
      expect(fs.readFileSync(userFile(), 'utf-8')).toBe('[db]\nport = 6000\n')
      expect(engine.effectiveScopeFor('db.port')).toBe('user')

      expect(engine.clear('db.port', 'user')).toBe(true)
      expect(engine.get('db.port')).toBe(5432)
      expect(engine.effectiveScopeFor('db.port')).toBe('default')
    })

    it('should let the environment override every file', () => {
      writeDefaults('[ui]\ncolor = red\n')
      env.SIGIL_DEMO_UI_COLOR = 'blue'
      const engine = makeEngine()

      expect(engine.get('ui.color')).toBe('blue')
      expect(engine.effectiveScopeFor('ui.color')).toBe('env')

      env.SIGIL_DEMO_UI_COLOR = 'green'
      expect(engine.get('ui.color')).toBe('green')
    })

    it('should let the environment override keys containing underscores and dashes', () => {
      const engine = makeEngine()
      engine.set('db.max_size', 5, 'user')
      engine.set('ui.font-size', 12, 'user')
      env.SIGIL_DEMO_DB_MAX_SIZE = '99'
      env.SIGIL_DEMO_UI_FONT_SIZE = '14'

      expect(engine.get('db.max_size')).toBe(99)
      expect(engine.get('ui.font-size')).toBe(14)
      expect(engine.effectiveScopeFor('db.max_size')).toBe('env')
      expect(engine.effective()).toEqual({ 'db.max_size': '99', 'ui.font-size': '14' })
      expect(engine.exportEnv()).toEqual({ SIGIL_DEMO_DB_MAX_SIZE: '99', SIGIL_DEMO_UI_FONT_SIZE: '14' })
    })

    it('should match a reference merge over random layers', () => {
      const keys = ['a', 'b.c', 'd.e.f', 'g']
      const values = ['1', 'x', 'true', '2.5', '[1]']
      let seed = 7
      const next = (): number => {
        seed = (seed * 1103515245 + 12345) % 2147483648
        return seed / 2147483648
      }
      const randomMapping = (): Mapping => {
        const mapping: Mapping = {}
        for (const key of keys) {
          if (next() < 0.5) mapping[key] = values[Math.floor(next() * values.length)]
        }
        return mapping
      }

      for (let round = 0; round < 25; round++) {
        fs.rmSync(configDir, { recursive: true, force: true })
        fs.rmSync(projectRoot, { recursive: true, force: true })
        for (const name of Object.keys(env)) delete env[name]

        const engine = makeEngine()
        const layers: Record<string, Mapping> = {}

        for (const scope of engine.policy.scopes()) {
          const mapping = randomMapping()
          layers[scope.id] = mapping
          if (scope.kind === 'overlay') {
            for (const [key, value] of Object.entries(mapping)) {
              env[envVarName('demo', key)] = value
            }
            continue
          }
          const file = engine.pathFor(scope.id)
          if (file !== null) iniBackend.save(file, mapping)
        }
        engine.invalidateCache()

        for (const key of keys) {
          const winner = engine.policy.scopes().find(scope => Object.hasOwn(layers[scope.id], key))
          const expected = winner ? autoCast(layers[winner.id][key]) : undefined
          expect(engine.get(key)).toEqual(expected)
          expect(engine.effectiveScopeFor(key)).toBe(winner ? winner.id : null)
        }
      }
    })

    it('should let an equal value in a higher scope win by presence', () => {
      writeDefaults('[db]\nport = 5432\n')
      const engine = makeEngine()
      engine.set('db.port', 5432, 'user')

      expect(engine.effectiveScopeFor('db.port')).toBe('user')
      expect(engine.clear('db.port', 'user')).toBe(true)
      expect(engine.effectiveScopeFor('db.port')).toBe('default')
    })

    it('should return the default when nothing matches', () => {
      const engine = makeEngine()
      expect(engine.get('missing')).toBeUndefined()
      expect(engine.get('missing', { default: 7 })).toBe(7)
      expect(engine.getInt('missing', 3)).toBe(3)
    })

    it('should apply explicit casts', () => {
      writeDefaults('name = demo\nflag = yes\n[db]\nport = 5432\nratio = 0.5\n')
      const engine = makeEngine()

      expect(engine.get('db.port', { cast: casts.string })).toBe('5432')
      expect(engine.getInt('db.port')).toBe(5432)
      expect(engine.getFloat('db.ratio')).toBe(0.5)
      expect(engine.getBool('flag')).toBe(true)
      expect(engine.getString('db.port')).toBe('5432')
      expect(() => engine.getInt('name')).toThrow(CastError)
      expect(() => engine.get('name', { cast: casts.int })).toThrow('Cannot cast "name" (value "demo")')
    })

    it('should reject invalid keys', () => {
      expect(() => makeEngine().get('db..port')).toThrow(InvalidKeyError)
    })

    it('should treat a missing defaults file as empty', () => {
      const engine = makeEngine({ defaultsPath: null })
      expect(engine.get('db.port')).toBeUndefined()
      expect(engine.listKeys('default')).toEqual([])
    })

    it('should surface corrupt files', () => {
      fs.mkdirSync(path.dirname(userFile()), { recursive: true })
      fs.writeFileSync(userFile(), 'garbage line\n')

      expect(() => makeEngine().get('db.port')).toThrow(CorruptFileError)
    })

    it('should refuse writes to a file holding a key it could not write back', () => {
      fs.mkdirSync(path.dirname(userFile()), { recursive: true })
      fs.writeFileSync(userFile(), '[ui]\nfont size = 12\n')
      const engine = makeEngine()

      expect(() => engine.listKeys('user')).toThrow('line 2: invalid key "ui.font size"')
      expect(() => engine.set('db.port', 1, 'user')).toThrow(CorruptFileError)
      expect(fs.readFileSync(userFile(), 'utf-8')).toBe('[ui]\nfont size = 12\n')
    })

    it('should layer in-memory defaults under the defaults file', () => {
      writeDefaults('[db]\nport = 5432\n')
      const engine = makeEngine({ defaults: { 'db.port': 1, 'db.host': 'localhost', 'ui.dark': false } })

      expect(engine.get('db.port')).toBe(5432)
      expect(engine.get('db.host')).toBe('localhost')
      expect(engine.get('ui.dark')).toBe(false)
      expect(engine.effectiveScopeFor('db.host')).toBe('default')
      expect(engine.listKeys('default')).toEqual(['db.host', 'db.port', 'ui.dark'])
    })

    it('should use in-memory defaults when no defaults file exists', () => {
      const engine = makeEngine({ defaultsPath: null, defaults: { retries: 3 } })
      expect(engine.get('retries')).toBe(3)
      expect(() => makeEngine({ defaults: { 'bad..key': 1 } })).toThrow(InvalidKeyError)
    })

    it('should surface unsupported formats', () => {
      expect(() => makeEngine({ settingsFilename: 'settings.toml' }).get('db.port')).toThrow(UnsupportedFormatError)
    })

    it('should read other formats through the registry', () => {
      const engine = makeEngine({ settingsFilename: 'settings.json' })
      engine.set('db.host', 'localhost', 'project')

      expect(JSON.parse(fs.readFileSync(path.join(projectRoot, '.sigil', 'settings.json'), 'utf-8')))
        .toEqual({ db: { host: 'localhost' } })
      engine.invalidateCache()
      expect(engine.get('db.host')).toBe('localhost')
    })
  })

  describe('cache', () => {
    it('should serve cached mappings until invalidated', () => {
      const engine = makeEngine()
      engine.set('a', '1', 'user')
      iniBackend.save(userFile(), { a: '2' })

      expect(engine.get('a')).toBe(1)
      engine.invalidateCache()
      expect(engine.get('a')).toBe(2)
    })

    it('should refresh only the written scope', () => {
      const engine = makeEngine()
      expect(engine.get('a')).toBeUndefined()

      iniBackend.save(projectFile(), { a: 'project' })
      engine.set('b', 'x', 'user')

      expect(engine.get('b')).toBe('x')
      expect(engine.get('a')).toBeUndefined()
    })
  })

  describe('set', () => {
    it('should skip the write when the value is unchanged', () => {
      const engine = makeEngine()
      engine.set('db.host', 'localhost', 'user')
      const before = fs.readFileSync(userFile())
      const save = vi.spyOn(iniBackend, 'save')

      engine.set('db.host', 'localhost', 'user')

      expect(save).not.toHaveBeenCalled()
      expect(fs.readFileSync(userFile()).equals(before)).toBe(true)
    })

    it('should preserve other keys in the file', () => {
      iniBackend.save(userFile(), { 'db.host': 'localhost', debug: 'true' })
      const engine = makeEngine()
      engine.set('db.port', 6000, 'user')

      expect(iniBackend.load(userFile())).toEqual({ 'db.host': 'localhost', 'db.port': '6000', debug: 'true' })
    })

    it('should store containers as JSON', () => {
      const engine = makeEngine()
      engine.set('list', [1, 2], 'user')
      engine.set('obj', { a: 'b' }, 'user')

      expect(engine.get('list')).toEqual([1, 2])
      expect(engine.get('obj')).toEqual({ a: 'b' })
      expect(engine.listKeys('user')).toEqual(['list', 'obj'])
    })

    it('should write host-suffixed files for machine scopes', () => {
      const engine = makeEngine()
      engine.set('a', '1', 'user-local')

      expect(fs.existsSync(path.join(configDir, 'demo', 'settings-local-testhost.ini'))).toBe(true)
      expect(engine.pathFor('user-local')).toBe(path.join(configDir, 'demo', 'settings-local-testhost.ini'))
    })

    it('should refuse read-only and unknown scopes without touching disk', () => {
      writeDefaults('[db]\nport = 5432\n')
      const before = fs.readFileSync(defaultsFile)
      const save = vi.spyOn(iniBackend, 'save')
      const engine = makeEngine()

      expect(() => engine.set('db.port', 1, 'default')).toThrow(NotWritableError)
      expect(() => engine.set('db.port', 1, 'env')).toThrow(NotWritableError)
      expect(() => engine.clear('db.port', 'default')).toThrow(NotWritableError)
      expect(() => engine.set('db.port', 1, 'nope')).toThrow(UnknownScopeError)

      expect(save).not.toHaveBeenCalled()
      expect(fs.readFileSync(defaultsFile).equals(before)).toBe(true)
      expect(fs.existsSync(configDir)).toBe(false)
    })

    it('should return false when clearing an absent key', () => {
      const engine = makeEngine()
      expect(engine.clear('missing', 'user')).toBe(false)
      expect(fs.existsSync(userFile())).toBe(false)
    })
  })

  describe('setMany', () => {
    it('should write several keys with one save', () => {
      const engine = makeEngine()
      const save = vi.spyOn(iniBackend, 'save')

      engine.setMany({ 'db.host': 'localhost', 'db.port': 5432, debug: true }, 'user')

      expect(save).toHaveBeenCalledTimes(1)
      expect(fs.readFileSync(userFile(), 'utf-8')).toBe('debug = true\n\n[db]\nhost = localhost\nport = 5432\n')
      expect(engine.get('db.port')).toBe(5432)
    })

    it('should skip the save when nothing changes', () => {
      const engine = makeEngine()
      engine.setMany({ a: '1', b: '2' }, 'user')
      const save = vi.spyOn(iniBackend, 'save')

      engine.setMany({ a: '1', b: '2' }, 'user')
      expect(save).not.toHaveBeenCalled()
    })

    it('should use the active write scope', () => {
      const engine = makeEngine()
      engine.withWriteScope('project', () => engine.setMany({ a: '1' }))
      expect(iniBackend.load(projectFile())).toEqual({ a: '1' })
    })

    it('should write nothing when a key or the scope is rejected', () => {
      const engine = makeEngine()

      expect(() => engine.setMany({ 'db.host': 'x', 'bad..key': 1 }, 'user')).toThrow(InvalidKeyError)
      expect(() => engine.setMany({ 'db.host': 'x' }, 'default')).toThrow(NotWritableError)
      expect(fs.existsSync(configDir)).toBe(false)
    })

    it('should route secret keys to the chain', () => {
      const keyring = new MemoryKeyring()
      const engine = makeEngine({ secrets: new SecretChain([new KeyringProvider('demo', { backend: () => keyring })]) })

      engine.setMany({ 'secret.token': 'test-secret', 'ui.color': 'blue' })

      expect(keyring.getPassword('sigil:demo', 'token')).toBe('test-secret')
      expect(iniBackend.load(userFile())).toEqual({ 'ui.color': 'blue' })
    })

    it('should check the secrets chain before writing files', () => {
      const engine = makeEngine({ secrets: new SecretChain([new EnvSecretProvider('demo', {})]) })

      expect(() => engine.setMany({ 'secret.token': 'x', a: '1' })).toThrow(SecretNotWritableError)
      expect(fs.existsSync(userFile())).toBe(false)
    })
  })

  describe('change events', () => {
    it('should report writes that change a stored value', () => {
      const engine = makeEngine()
      const events: ChangeEvent[] = []
      const unsubscribe = engine.onChange(event => events.push(event))

      engine.set('db.port', 6000, 'user')
      engine.set('db.port', 6000, 'user')
      engine.clear('db.port', 'user')
      engine.clear('db.port', 'user')
      unsubscribe()
      engine.set('db.port', 1, 'user')

      expect(events).toEqual([
        { key: 'db.port', value: 6000, scope: 'user' },
        { key: 'db.port', value: undefined, scope: 'user' }
      ])
    })

    it('should report batch and secret writes', () => {
      const keyring = new MemoryKeyring()
      const engine = makeEngine({ secrets: new SecretChain([new KeyringProvider('demo', { backend: () => keyring })]) })
      const events: ChangeEvent[] = []
      engine.onChange(event => events.push(event))

      engine.setMany({ a: 1, b: [1, 2] }, 'project')
      engine.set('secret.token', 'test-secret')
      engine.clear('secret.token')

      expect(events).toEqual([
        { key: 'a', value: 1, scope: 'project' },
        { key: 'b', value: [1, 2], scope: 'project' },
        { key: 'secret.token', value: 'test-secret', scope: 'secrets', provider: 'keyring' },
        { key: 'secret.token', value: undefined, scope: 'secrets' }
      ])
    })
  })

  describe('write scope', () => {
    it('should default to the user scope', () => {
      const engine = makeEngine()
      engine.set('a', '1')
      expect(engine.defaultWriteScope).toBe('user')
      expect(iniBackend.load(userFile())).toEqual({ a: '1' })
    })

    it('should use the scope of a withWriteScope block and restore it after', () => {
      const engine = makeEngine()
      engine.withWriteScope('project', () => {
        expect(engine.activeWriteScope()).toBe('project')
        engine.set('a', '1')
      })

      expect(iniBackend.load(projectFile())).toEqual({ a: '1' })
      expect(engine.activeWriteScope()).toBe('user')
    })

    it('should restore the scope when the block throws', () => {
      const engine = makeEngine()
      expect(() => engine.withWriteScope('project', () => {
        throw new Error('boom')
      })).toThrow('boom')
      expect(engine.activeWriteScope()).toBe('user')
    })

    it('should keep the scope across awaits inside the block', async () => {
      const engine = makeEngine()
      await engine.withWriteScope('project', async () => {
        await Promise.resolve()
        engine.set('b', '2')
      })

      expect(iniBackend.load(projectFile())).toEqual({ b: '2' })
      expect(engine.activeWriteScope()).toBe('user')
    })

    it('should prefer an explicit scope over the block', () => {
      const engine = makeEngine()
      engine.withWriteScope('project', () => engine.set('c', '3', 'user'))
      expect(iniBackend.load(userFile())).toEqual({ c: '3' })
    })

    it('should validate the scope before running the block', () => {
      const engine = makeEngine()
      const fn = vi.fn()

      expect(() => engine.withWriteScope('default', fn)).toThrow(NotWritableError)
      expect(() => engine.withWriteScope('nope', fn)).toThrow(UnknownScopeError)
      expect(fn).not.toHaveBeenCalled()
    })

    it('should change the engine default', () => {
      const engine = makeEngine()
      engine.setDefaultWriteScope('project')
      engine.set('a', '1')

      expect(engine.defaultWriteScope).toBe('project')
      expect(iniBackend.load(projectFile())).toEqual({ a: '1' })
      expect(() => engine.setDefaultWriteScope('env')).toThrow(NotWritableError)
    })

    it('should validate a configured default write scope', () => {
      expect(() => makeEngine({ defaultWriteScope: 'default' })).toThrow(NotWritableError)
    })
  })

  describe('views', () => {
    it('should expose layers, the merged view and an env export', () => {
      writeDefaults('[db]\nhost = localhost\nport = 5432\n')
      const engine = makeEngine()
      engine.set('db.port', 6000, 'user')
      engine.set('secret.token', 'placeholder', 'user')

      expect(engine.layers()).toEqual({
        env: {},
        'project-local': {},
        project: {},
        'user-local': {},
        user: { 'db.port': '6000', 'secret.token': 'placeholder' },
        default: { 'db.host': 'localhost', 'db.port': '5432' }
      })
      expect(engine.effective()).toEqual({ 'db.host': 'localhost', 'db.port': '6000', 'secret.token': 'placeholder' })
      expect(engine.exportEnv()).toEqual({ SIGIL_DEMO_DB_HOST: 'localhost', SIGIL_DEMO_DB_PORT: '6000' })
      expect(engine.exportEnv({ includeSecrets: true, prefix: 'APP_' })).toEqual({
        APP_DEMO_DB_HOST: 'localhost',
        APP_DEMO_DB_PORT: '6000',
        APP_DEMO_SECRET_TOKEN: 'placeholder'
      })
    })
  })

  describe('secrets', () => {
    const withKeyring = (keyring: MemoryKeyring): Partial<EngineOptions> => ({
      secrets: new SecretChain([new KeyringProvider('demo', { backend: () => keyring })])
    })

    it('should route secret keys to the chain', () => {
      const keyring = new MemoryKeyring()
      const engine = makeEngine(withKeyring(keyring))

      engine.set('secret.token', 'test-secret')
      expect(keyring.getPassword('sigil:demo', 'token')).toBe('test-secret')
      expect(engine.get('secret.token')).toBe('test-secret')
      expect(fs.existsSync(userFile())).toBe(false)

      expect(engine.clear('secret.token')).toBe(true)
      expect(engine.get('secret.token', { default: 'fallback' })).toBe('fallback')
    })

    it('should fall back to settings files for secret keys', () => {
      const engine = makeEngine(withKeyring(new MemoryKeyring()))
      engine.set('secret.api_key', 'from-file', 'user')

      expect(engine.get('secret.api_key')).toBe('from-file')
    })
  })

  describe('policy', () => {
    it('should capture the policy at construction', () => {
      const engine = makeEngine()
      const previous = defaultPolicy.replace(createDefaultPolicy('user_over_project'))
      try {
        expect(engine.policy.scopeIds()[1]).toBe('project-local')
        expect(makeEngine().policy.scopeIds()[1]).toBe('user-local')
      } finally {
        defaultPolicy.replace(previous)
      }
    })

    it('should require a reader for every overlay scope', () => {
      const policy = createDefaultPolicy().withScopes([{ id: 'cli', kind: 'overlay' }], [], { before: 'env' })

      expect(() => makeEngine({ policy })).toThrow(InvalidPolicyError)

      const engine = makeEngine({ policy, overlays: { cli: () => ({ 'ui.color': 'cyan' }) } })
      expect(engine.get('ui.color')).toBe('cyan')
      expect(engine.effectiveScopeFor('ui.color')).toBe('cli')
    })

    it('should honour user_over_project', () => {
      const engine = makeEngine({ policy: createDefaultPolicy('user_over_project') })
      engine.set('a', 'project', 'project')
      engine.set('a', 'user', 'user')

      expect(engine.get('a')).toBe('user')
    })
  })
})

describe('createEngine', () => {
  let tempDir: string
  let configHome: string
  let projectDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sigil-create-engine-test-'))
    configHome = path.join(tempDir, 'config')
    projectDir = path.join(tempDir, 'project')
    fs.mkdirSync(path.join(projectDir, '.sigil'), { recursive: true })
    fs.mkdirSync(configHome, { recursive: true })
    setSilent(true)
  })

  afterEach(() => {
    setSilent(false)
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should wire configuration, discovery and the secrets chain', () => {
    fs.writeFileSync(path.join(configHome, 'config.yaml'), 'policy: user_over_project\nvault:\n  iterations: 1000\n')
    const defaults = path.join(tempDir, 'checkout', 'settings.ini')
    fs.mkdirSync(path.dirname(defaults), { recursive: true })
    fs.writeFileSync(defaults, '[db]\nport = 5432\n')
    linkDefaults('demo', defaults, { configHome })

    const engine = createEngine('Demo', {
      configHome,
      cwd: path.join(projectDir, '.sigil'),
      env: { SIGIL_SECRET_DEMO_API_KEY: 'abc123', SIGIL_DEMO_UI_COLOR: 'blue' },
      keyring: unavailableKeyring
    })

    expect(engine.providerId).toBe('demo')
    expect(engine.policy.scopeIds()).toEqual(['env', 'user-local', 'user', 'project-local', 'project', 'default'])
    expect(engine.pathFor('project')).toBe(path.join(projectDir, '.sigil', 'settings.ini'))
    expect(engine.pathFor('user')).toBe(path.join(configHome, 'demo', 'settings.ini'))
    expect(engine.pathFor('default')).toBe(defaults)
    expect(engine.get('db.port')).toBe(5432)
    expect(engine.get('ui.color')).toBe('blue')
    expect(engine.get('secret.api_key')).toBe('abc123')
  })

  it('should store secrets in the vault beside the user settings', () => {
    fs.writeFileSync(path.join(configHome, 'config.yaml'), 'vault:\n  iterations: 1000\n')
    const engine = createEngine('demo', {
      configHome,
      cwd: projectDir,
      env: { SIGIL_MASTER_PWD: 'test-secret' },
      keyring: unavailableKeyring
    })

    engine.set('secret.token', 'placeholder')
    expect(fs.existsSync(path.join(configHome, 'demo', 'settings.enc.json'))).toBe(true)
    expect(engine.get('secret.token')).toBe('placeholder')
  })

  it('should unlock the vault with a passphrase supplied at run time', () => {
    fs.writeFileSync(path.join(configHome, 'config.yaml'), 'vault:\n  iterations: 1000\n')
    const engine = createEngine('demo', { configHome, cwd: projectDir, env: {}, keyring: unavailableKeyring })

    expect(() => engine.set('secret.token', 'placeholder')).toThrow(SecretNotWritableError)
    expect(engine.unlockSecrets('test-secret')).toEqual(['vault'])

    engine.set('secret.token', 'placeholder')
    expect(engine.get('secret.token')).toBe('placeholder')
    expect(fs.existsSync(path.join(configHome, 'demo', 'settings.enc.json'))).toBe(true)
  })

  it('should use the configured settings file name and write scope', () => {
    fs.writeFileSync(
      path.join(configHome, 'config.yaml'),
      'settings_filename: settings.yaml\ndefault_write_scope: project\n'
    )
    const engine = createEngine('demo', { configHome, cwd: projectDir, env: {}, secrets: false })

    engine.set('db.host', 'localhost')
    expect(engine.secrets).toBeUndefined()
    expect(engine.unlockSecrets('test-secret')).toEqual([])
    expect(engine.defaultWriteScope).toBe('project')
    expect(fs.existsSync(path.join(projectDir, '.sigil', 'settings.yaml'))).toBe(true)
    expect(engine.get('db.host')).toBe('localhost')
  })
})
