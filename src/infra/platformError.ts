/**
 * Classification of @effect/platform failures into the handful of cases the
 * infra services turn into typed errors.
 */

import type { Error as PlatformErrors } from "@effect/platform"

export type PlatformFailure = "NotFound" | "PermissionDenied" | "AlreadyExists" | "Other"

export const platformFailure = (error: PlatformErrors.PlatformError): PlatformFailure => {
  if (error._tag !== "SystemError") return "Other"
  switch (error.reason) {
    case "NotFound":
    case "PermissionDenied":
    case "AlreadyExists":
      return error.reason
    default:
      return "Other"
  }
}
