import { SubmissionError } from '../../lib/api/errors'
import { JsonObject, JsonValue } from '../helpers/historyInterfaces'
import { Platform } from '../models/status'

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function child(parent: JsonObject, key: string, path: string): JsonObject {
  const value = parent[key]
  if (!isJsonObject(value)) {
    throw new SubmissionError(`job spec has no ${path}`)
  }
  return value
}

// The container image and every command element naming it.
function replaceLocalImage(spec: JsonObject, image: string): JsonObject {
  const previous = spec.container
  const command = Array.isArray(spec.command) ? spec.command : []
  return {
    ...spec,
    container: image,
    command: command.map((part) =>
      previous !== undefined && part === previous ? image : part
    ),
  }
}

function replaceCaipImage(spec: JsonObject, image: string): JsonObject {
  const copy = structuredClone(spec)
  const trainingInput = child(copy, 'trainingInput', 'trainingInput')
  const masterConfig = child(trainingInput, 'masterConfig', 'trainingInput.masterConfig')
  masterConfig.imageUri = image
  return copy
}

function replaceGkeImage(spec: JsonObject, image: string): JsonObject {
  const copy = structuredClone(spec)
  const template = child(copy, 'template', 'template')
  const podSpec = child(template, 'spec', 'template.spec')
  const containers = podSpec.containers
  if (!Array.isArray(containers)) {
    throw new SubmissionError('job spec has no template.spec.containers')
  }
  for (const container of containers) {
    if (isJsonObject(container)) container.image = image
  }
  return copy
}

/**
 * Copy of a stored job spec that runs `image` instead of the image it was
 * submitted with. The spec passed in is left unchanged.
 */
export function replaceJobSpecImage(
  platform: Platform,
  spec: JsonObject,
  image: string
): JsonObject {
  switch (platform) {
    case Platform.LOCAL:
      return replaceLocalImage(spec, image)
    case Platform.CAIP:
      return replaceCaipImage(spec, image)
    case Platform.GKE:
      return replaceGkeImage(spec, image)
    case Platform.TEST:
      return structuredClone(spec)
  }
}
