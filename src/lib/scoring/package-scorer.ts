/**
 * Package ecosystem factor
 *
 * A requested package counts as found when it is an installed system package
 * or an installed package manager of the candidate, compared case-insensitively.
 */

import { RECOMMENDATION_SCORING } from '../../config/scoring';
import type { CandidateAnalysis, Requirement } from '../../types/recommendation';
import { factorScore, type FactorScore } from './base-scorer';

const { PACKAGE } = RECOMMENDATION_SCORING;

export interface PackageAvailability {
  /** Requested packages installed as system packages */
  preInstalled: string[];
  /** Requested packages present only as package managers */
  managers: string[];
  missing: string[];
}

/**
 * Partition the requested packages by where the candidate provides them
 */
export function checkPackageAvailability(
  analysis: CandidateAnalysis,
  packages: readonly string[],
): PackageAvailability {
  const systemPackages = new Set(analysis.systemPackages.map((name) => name.toLowerCase()));
  const managers = new Set(analysis.packageManagers.map((name) => name.toLowerCase()));
  const availability: PackageAvailability = { preInstalled: [], managers: [], missing: [] };

  for (const pkg of packages) {
    const name = pkg.toLowerCase();
    if (systemPackages.has(name)) {
      availability.preInstalled.push(pkg);
    } else if (managers.has(name)) {
      availability.managers.push(pkg);
    } else {
      availability.missing.push(pkg);
    }
  }

  return availability;
}

function describeAvailability(availability: PackageAvailability, managerLabel: string): string {
  const parts: string[] = [];
  if (availability.preInstalled.length > 0) {
    parts.push(`${availability.preInstalled.length} pre-installed`);
  }
  if (availability.managers.length > 0) {
    parts.push(`${availability.managers.length} ${managerLabel}`);
  }
  return parts.join(', ');
}

/**
 * Score how many requested packages the candidate already provides
 */
export function scorePackageEcosystem(analysis: CandidateAnalysis, requirement: Requirement): FactorScore {
  if (requirement.packages.length === 0) {
    return factorScore(PACKAGE.ALL_FOUND, 'Rich package ecosystem');
  }

  const availability = checkPackageAvailability(analysis, requirement.packages);
  const found = availability.preInstalled.length + availability.managers.length;

  if (availability.missing.length === 0) {
    return factorScore(
      PACKAGE.ALL_FOUND,
      `All packages available (${describeAvailability(availability, 'package managers available')})`,
    );
  }

  if (found === 0) {
    return factorScore(
      analysis.capabilities.includes(PACKAGE.HTTP_CLIENT_CAPABILITY)
        ? PACKAGE.HTTP_CLIENT_FALLBACK
        : PACKAGE.MINIMAL_SUPPORT,
    );
  }

  const score = found / requirement.packages.length;
  if (score >= PACKAGE.DETAILED_AT_LEAST) {
    return factorScore(
      score,
      `${describeAvailability(availability, 'available as managers')} (${availability.missing.length} missing)`,
    );
  }
  if (score > PACKAGE.GOOD_ABOVE) {
    return factorScore(score, 'Good package manager support');
  }
  return factorScore(score);
}
