// src/architecture-detector.ts — Architecture Style Detector
// Two styles come from the shape of the workspace; every other style in the
// catalogue goes through the generic evidence scorer with a higher bar.

import type {
  CommunicationPattern,
  CommunicationSignature,
  Detection,
  ManifestInfo,
  StyleSignature,
  Warning,
} from "./types.js";
import { detectSignatures, sortByConfidence } from "./pattern-detector.js";
import { countOccurrences } from "./text-utils.js";

export const STYLE_THRESHOLD = 0.3;
export const WORKSPACE_PACKAGE_THRESHOLD = 3;
export const MONOLITH_MODULE_THRESHOLD = 10;

export const MULTI_PACKAGE_STYLE = "Multi-Crate Workspace";
export const MONOLITH_STYLE = "Modular Monolith";

const MOD_DECLARATION = /\bmod\s+\w+/g;

export type WorkspaceShape = Pick<ManifestInfo, "isWorkspace" | "packageCount">;

/**
 * Detect architecture styles for one project.
 *
 * - workspace with more than 3 packages → "Multi-Crate Workspace" at 0.9
 * - single package with more than 10 `mod` declarations → "Modular Monolith" at 0.7
 * - remaining styles: generic scorer over corpus + manifest, threshold 0.3
 */
export function detectArchitectureStyles(
  corpus: string,
  manifestText: string,
  workspace: WorkspaceShape,
  styles: readonly StyleSignature[],
  warnings: Warning[] = [],
): Detection[] {
  const detected: Detection[] = [];

  if (workspace.isWorkspace && workspace.packageCount > WORKSPACE_PACKAGE_THRESHOLD) {
    detected.push(
      withDescription(
        {
          name: MULTI_PACKAGE_STYLE,
          confidence: 0.9,
          evidence: [`Workspace with ${workspace.packageCount} packages`],
        },
        styles,
        "multi-package-workspace",
      ),
    );
  } else if (!workspace.isWorkspace) {
    const moduleCount = countModuleDeclarations(corpus);
    if (moduleCount > MONOLITH_MODULE_THRESHOLD) {
      detected.push(
        withDescription(
          {
            name: MONOLITH_STYLE,
            confidence: 0.7,
            evidence: [`Single crate with ${moduleCount} module declarations`],
          },
          styles,
          "modular-monolith",
        ),
      );
    }
  }

  const scored = styles.filter((s) => s.heuristic === undefined);
  const combined = `${corpus}\n${manifestText}`;
  detected.push(
    ...detectSignatures(combined, manifestText, scored, {
      threshold: STYLE_THRESHOLD,
      warnings,
    }),
  );

  return sortByConfidence(detected);
}

export function countModuleDeclarations(corpus: string): number {
  return corpus.match(MOD_DECLARATION)?.length ?? 0;
}

/**
 * Report each communication mechanism whose literal signals occur in the
 * sources or the manifests, with the total number of occurrences. Most used
 * first.
 */
export function detectCommunicationPatterns(
  corpus: string,
  manifestText: string,
  signatures: readonly CommunicationSignature[],
): CommunicationPattern[] {
  const text = `${corpus}\n${manifestText}`;
  const detected: CommunicationPattern[] = [];

  for (const signature of signatures) {
    const found = signature.signals.filter((signal) => text.includes(signal));
    if (found.length === 0) continue;
    detected.push({
      name: signature.name,
      evidence: found,
      usageCount: found.reduce((sum, signal) => sum + countOccurrences(text, signal), 0),
    });
  }

  return detected.sort((a, b) => b.usageCount - a.usageCount);
}

function withDescription(
  detection: Detection,
  styles: readonly StyleSignature[],
  heuristic: StyleSignature["heuristic"],
): Detection {
  const description = styles.find((s) => s.heuristic === heuristic)?.description;
  return description ? { ...detection, description } : detection;
}
