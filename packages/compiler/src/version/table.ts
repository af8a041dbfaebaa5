/**
 * Version feature table and target parsing.
 *
 * A target names a range of host versions. A feature is usable when every
 * version in the range has it: the low end must reach `min`, and the high end
 * must stay below `removed` when the feature was dropped.
 */

import { readFileSync } from 'node:fs'
import { ConfigurationError } from '../core/errors.ts'

/** [major, minor] */
export type Version = readonly [number, number]

export interface FeatureEntry {
	readonly name: string
	readonly description: string
	/** As written in the table, used for display */
	readonly min: string
	readonly minVersion: Version
	readonly removed?: string
	readonly removedVersion?: Version
}

export interface TargetRange {
	/** Target string as configured */
	readonly target: string
	readonly lo: Version
	readonly hi: Version
}

interface FeatureTable {
	readonly versions: readonly Version[]
	readonly versionNames: readonly string[]
	readonly features: ReadonlyMap<string, FeatureEntry>
}

export function parseVersion(text: string): Version | undefined {
	const m = /^(\d)(?:\.(\d+))?$/.exec(text)
	if (m === null) return undefined
	return [Number(m[1]), m[2] === undefined ? 0 : Number(m[2])]
}

export function compareVersions(a: Version, b: Version): number {
	return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1]
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readEntry(name: string, raw: unknown): FeatureEntry {
	if (!isRecord(raw) || typeof raw['description'] !== 'string' || typeof raw['min'] !== 'string') {
		throw new Error(`Malformed feature entry: ${name}`)
	}
	const minVersion = parseVersion(raw['min'])
	if (minVersion === undefined) throw new Error(`Malformed minimum version for ${name}`)
	const removed = raw['removed']
	if (typeof removed === 'string') {
		const removedVersion = parseVersion(removed)
		if (removedVersion === undefined) throw new Error(`Malformed removal version for ${name}`)
		return { description: raw['description'], min: raw['min'], minVersion, name, removed, removedVersion }
	}
	return { description: raw['description'], min: raw['min'], minVersion, name }
}

function loadTable(): FeatureTable {
	const raw: unknown = JSON.parse(readFileSync(new URL('./features.json', import.meta.url), 'utf-8'))
	if (!isRecord(raw) || !Array.isArray(raw['versions']) || !isRecord(raw['features'])) {
		throw new Error('Malformed feature table')
	}
	const versionNames: string[] = []
	const versions: Version[] = []
	for (const name of raw['versions']) {
		const v = typeof name === 'string' ? parseVersion(name) : undefined
		if (typeof name !== 'string' || v === undefined) throw new Error(`Malformed version: ${String(name)}`)
		versionNames.push(name)
		versions.push(v)
	}
	const features = new Map<string, FeatureEntry>()
	for (const [name, entry] of Object.entries(raw['features'])) {
		features.set(name, readEntry(name, entry))
	}
	return { features, versionNames, versions }
}

const TABLE: FeatureTable = loadTable()

export function knownVersions(): readonly string[] {
	return TABLE.versionNames
}

function firstVersion(): Version {
	const v = TABLE.versions[0]
	if (v === undefined) throw new Error('Feature table lists no versions')
	return v
}

export function latestVersion(): Version {
	const v = TABLE.versions[TABLE.versions.length - 1]
	if (v === undefined) throw new Error('Feature table lists no versions')
	return v
}

function familyRange(major: number): [Version, Version] | undefined {
	const members = TABLE.versions.filter((v) => v[0] === major)
	const lo = members[0]
	const hi = members[members.length - 1]
	return lo !== undefined && hi !== undefined ? [lo, hi] : undefined
}

/** "27" -> "2.7", "310" -> "3.10"; dotted input is returned unchanged. */
export function normalizeTarget(target: string): string {
	if (/^\d{2,3}$/.test(target)) return `${target[0]}.${target.slice(1)}`
	return target
}

/**
 * Parse a configured target into the version range it stands for.
 *
 * @throws {ConfigurationError} If the target names no known version or family
 */
export function parseTarget(target: string): TargetRange {
	if (target === '') return { hi: latestVersion(), lo: firstVersion(), target }
	if (target === 'sys') return { hi: latestVersion(), lo: latestVersion(), target }
	if (/^\d$/.test(target)) {
		const family = familyRange(Number(target))
		if (family !== undefined) return { hi: family[1], lo: family[0], target }
	}
	const exact = parseVersion(normalizeTarget(target))
	if (exact !== undefined && TABLE.versions.some((v) => compareVersions(v, exact) === 0)) {
		return { hi: exact, lo: exact, target }
	}
	const families = [...new Set(TABLE.versions.map((v) => String(v[0])))]
	throw new ConfigurationError(
		'target',
		`unsupported target '${target}' (supported targets: ${[...families, ...TABLE.versionNames, 'sys'].join(', ')})`
	)
}

export function isValidTarget(target: string): boolean {
	try {
		parseTarget(target)
		return true
	} catch (err) {
		if (err instanceof ConfigurationError) return false
		throw err
	}
}

/** Human-readable form used in messages. */
export function displayTarget(target: string): string {
	if (target === '') return 'universal'
	return normalizeTarget(target)
}

export function getFeature(name: string): FeatureEntry {
	const entry = TABLE.features.get(name)
	if (entry === undefined) throw new Error(`Unknown feature: ${name}`)
	return entry
}

export function featureNames(): string[] {
	return [...TABLE.features.keys()]
}

export function supports(feature: string, range: TargetRange): boolean {
	const entry = getFeature(feature)
	if (compareVersions(range.lo, entry.minVersion) < 0) return false
	if (entry.removedVersion !== undefined && compareVersions(range.hi, entry.removedVersion) >= 0) {
		return false
	}
	return true
}

/** True when the range reaches back into the 2.x family. */
export function targetIncludesPy2(range: TargetRange): boolean {
	return range.lo[0] < 3
}
