/**
 * @canopy/core - Service Health Report
 *
 * Structured record of the bootstrap validation sweep, handed to a
 * reporting surface (console dump or JSON file).
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ConfigurationError } from '../../domain/exceptions';
import type { ServiceIdentifier } from '../di/IDependencyInjection';
import { CapabilityCatalog } from './coreServices';
import checklistData from './service-checklist.json';

/**
 * One checklist entry
 */
export interface ServiceCheck {
  name: string;
  identifier: ServiceIdentifier<unknown>;
  critical: boolean;
  /** Consequence reported when a critical check fails */
  impact?: string;
}

export interface ServiceValidationResult {
  serviceName: string;
  isCritical: boolean;
  isRegistered: boolean;
  isNullImplementation: boolean;
  implementationName?: string;
  errorMessage?: string;
}

export enum ServiceHealth {
  Healthy = 'Healthy',
  Warning = 'Warning',
  Critical = 'Critical',
}

export interface ServiceHealthReport {
  generatedAt: string;
  isBootstrapped: boolean;
  totalServices: number;
  registeredServices: number;
  criticalServices: number;
  criticalFailures: number;
  nullImplementations: number;
  overallHealth: ServiceHealth;
  /** One entry per missing critical capability */
  errors: string[];
  /** One entry per missing optional capability or null implementation */
  warnings: string[];
  dependencyIssues: string[];
  validationResults: ServiceValidationResult[];
}

/**
 * Highest number of critical failures still reported as Warning
 */
export const WARNING_CRITICAL_FAILURE_LIMIT = 2;

/**
 * 0 critical failures is Healthy, up to 2 is Warning, more is Critical
 */
export function evaluateHealth(criticalFailures: number): ServiceHealth {
  if (criticalFailures === 0) return ServiceHealth.Healthy;
  if (criticalFailures <= WARNING_CRITICAL_FAILURE_LIMIT) return ServiceHealth.Warning;
  return ServiceHealth.Critical;
}

/**
 * Assemble a report from checklist results
 */
export function createHealthReport(
  checks: readonly ServiceCheck[],
  results: readonly ServiceValidationResult[],
  isBootstrapped: boolean,
  generatedAt: Date = new Date(),
): ServiceHealthReport {
  const errors: string[] = [];
  const warnings: string[] = [];
  const dependencyIssues: string[] = [];

  for (const result of results) {
    if (!result.isRegistered) {
      const message = `${result.serviceName}: ${result.errorMessage ?? 'service not registered'}`;
      (result.isCritical ? errors : warnings).push(message);
    } else if (result.isNullImplementation) {
      warnings.push(`${result.serviceName}: using null implementation ${result.implementationName ?? ''}`.trim());
    }
  }

  const failedCritical = results.filter((r) => r.isCritical && !r.isRegistered);
  if (failedCritical.length > 0) {
    dependencyIssues.push('Critical service failures may cause cascading failures in dependent systems');
  }
  for (const failed of failedCritical) {
    const impact = checks.find((check) => check.name === failed.serviceName)?.impact;
    if (impact) dependencyIssues.push(impact);
  }

  return {
    generatedAt: generatedAt.toISOString(),
    isBootstrapped,
    totalServices: results.length,
    registeredServices: results.filter((r) => r.isRegistered).length,
    criticalServices: results.filter((r) => r.isCritical).length,
    criticalFailures: failedCritical.length,
    nullImplementations: results.filter((r) => r.isNullImplementation).length,
    overallHealth: evaluateHealth(failedCritical.length),
    errors,
    warnings,
    dependencyIssues,
    validationResults: [...results],
  };
}

/**
 * Render a report as console lines
 */
export function formatHealthReport(report: ServiceHealthReport): string {
  const lines = [
    '=== SERVICE HEALTH REPORT ===',
    `Generated: ${report.generatedAt}`,
    `Overall health: ${report.overallHealth}`,
    `Bootstrapped: ${report.isBootstrapped}`,
    `Services: ${report.registeredServices}/${report.totalServices} registered`,
    `Critical: ${report.criticalServices} (${report.criticalFailures} failed)`,
    `Null implementations: ${report.nullImplementations}`,
  ];

  const section = (title: string, items: string[]) => {
    if (items.length === 0) return;
    lines.push(`${title}:`, ...items.map((item) => `  - ${item}`));
  };

  section('Errors', report.errors);
  section('Warnings', report.warnings);
  section('Dependency issues', report.dependencyIssues);

  lines.push('Services:');
  for (const result of report.validationResults) {
    const status = !result.isRegistered ? 'MISSING' : result.isNullImplementation ? 'NULL' : 'OK';
    const tag = result.isCritical ? 'critical' : 'optional';
    lines.push(`  [${status}] ${result.serviceName} (${tag})`);
  }

  return lines.join('\n');
}

/**
 * Persist a report as pretty-printed JSON
 */
export async function writeHealthReport(
  report: ServiceHealthReport,
  filePath: string,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(report, null, 2) + '\n', 'utf8');
}

/**
 * Checklist shipped with the core, resolved against the capability catalog
 *
 * @throws ConfigurationError for a capability the catalog does not know
 */
export function loadDefaultChecklist(): ServiceCheck[] {
  return checklistData.map((entry) => {
    const identifier = CapabilityCatalog.get(entry.capability);
    if (!identifier) {
      throw new ConfigurationError('service-checklist', `unknown capability '${entry.capability}'`);
    }
    return {
      name: entry.capability,
      identifier,
      critical: entry.critical,
      impact: entry.impact,
    };
  });
}
