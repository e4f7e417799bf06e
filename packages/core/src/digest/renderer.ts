import { ROOT_DIRECTORY, type DigestReport } from '@dirdigest/shared';

export function renderDigest(project: string, report: DigestReport): string {
  let out = `# ${project}\n\n`;
  for (const section of report) {
    out +=
      section.directory === ROOT_DIRECTORY
        ? '## Root Directory\n\n'
        : `## ${section.directory}/\n\n`;
    for (const entry of section.entries) {
      out += `- **${entry.fileName}**: ${entry.summary}\n`;
    }
    out += '\n';
  }
  return out;
}
