import type { HostRecord, RemediationOutcome, TranslatedQuery } from "../types.js";

function formatHost(index: number, host: HostRecord, remediation: RemediationOutcome): string {
  let block =
    `\n📊 Result ${index}:\n` +
    `IP: ${host.address}\n` +
    `Port: ${host.port}\n` +
    `Organization: ${host.organization}\n` +
    `Location: ${host.location}\n` +
    `Product: ${host.product} ${host.version}\n`;
  if (host.vulnerabilities.length > 0) {
    block += `Vulnerabilities: ${host.vulnerabilities.join(", ")}\n`;
  }
  block += `\n🛡️ Proposed Solution for Result ${index}:\n${remediation.text}\n`;
  return block;
}

/**
 * Render the guidance text returned to users. Host `i` is printed with
 * `remediations[i]`; the two lists must be the same length.
 */
export function formatReport(
  query: TranslatedQuery,
  hosts: readonly HostRecord[],
  remediations: readonly RemediationOutcome[],
): string {
  if (hosts.length !== remediations.length) {
    throw new Error(
      `Remediation count ${remediations.length} does not match host count ${hosts.length}`,
    );
  }

  let report =
    `🔍 Suggested Shodan Query:\n${query.searchQuery}\n\n` +
    `📝 Explanation:\n${query.explanation}\n\n` +
    `🌐 Results and Solutions:\n`;

  hosts.forEach((host, i) => {
    report += formatHost(i + 1, host, remediations[i]);
  });
  return report;
}
