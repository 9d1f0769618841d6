/**
 * Filename classification and destination layout.
 *
 * Everything here is a pure function of the file name and the configured
 * rules. Collision handling needs the filesystem and lives in
 * DestinationService.
 */

import * as path from "node:path"
import type { IngestConfig } from "./IngestConfig"

// =============================================================================
// Types
// =============================================================================

export interface ClipTokens {
  readonly project: string
  readonly client: string
  readonly camera: string
  /** Whatever follows the camera designator, e.g. "001" or "Take5" */
  readonly clip: string
}

interface ClassifiedBase {
  readonly originalPath: string
  readonly fileName: string
  /** Including the leading dot; empty when the name has none */
  readonly extension: string
}

export interface MatchedFile extends ClassifiedBase {
  readonly matched: true
  readonly tokens: ClipTokens
}

export interface UnmatchedFile extends ClassifiedBase {
  readonly matched: false
}

export type ClassifiedFile = MatchedFile | UnmatchedFile

export interface ClassifierRules {
  readonly pattern: RegExp
  /** Directory template using {client}, {project} and {camera} */
  readonly folderStructure: string
  readonly unmatchedFolder: string
  readonly destinationRoot: string
}

export const rulesFromConfig = (config: IngestConfig): ClassifierRules => ({
  pattern: new RegExp(config.parsing.pattern),
  folderStructure: config.parsing.folderStructure,
  unmatchedFolder: config.parsing.unmatchedFolder,
  destinationRoot: config.destinationPath,
})

// =============================================================================
// Classification
// =============================================================================

export const classify = (filePath: string, pattern: RegExp): ClassifiedFile => {
  const fileName = path.basename(filePath)
  const extension = path.extname(fileName)
  const base = { originalPath: filePath, fileName, extension }

  const match = pattern.exec(fileName.slice(0, fileName.length - extension.length))
  if (!match || match.length !== 5) {
    return { ...base, matched: false }
  }

  const [, project = "", client = "", camera = "", clip = ""] = match
  return { ...base, matched: true, tokens: { project, client, camera, clip } }
}

// =============================================================================
// Destination layout
// =============================================================================

export const destinationDirectory = (file: ClassifiedFile, rules: ClassifierRules): string => {
  if (!file.matched) {
    return path.join(rules.destinationRoot, rules.unmatchedFolder)
  }

  const folder = rules.folderStructure
    .replaceAll("{client}", file.tokens.client)
    .replaceAll("{project}", file.tokens.project)
    .replaceAll("{camera}", file.tokens.camera)

  return path.join(rules.destinationRoot, folder)
}

/** Matched clips keep only the clip token; the rest lives in the directory. */
export const destinationFileName = (file: ClassifiedFile): string =>
  file.matched ? `${file.tokens.clip}${file.extension}` : file.fileName

export const destinationPath = (file: ClassifiedFile, rules: ClassifierRules): string =>
  path.join(destinationDirectory(file, rules), destinationFileName(file))

/**
 * `dir/001.mp4` with version 3 becomes `dir/001_v3.mp4`.
 */
export const versionedPath = (filePath: string, version: number): string => {
  const extension = path.extname(filePath)
  const stem = path.basename(filePath, extension)
  return path.join(path.dirname(filePath), `${stem}_v${version}${extension}`)
}
