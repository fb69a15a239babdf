import { FILE_PATTERNS } from '../../constants/index.js';
import type { Project } from '../project.js';
import type { GeneratedFile, Generator } from './generator.js';

function mermaidId(name: string): string {
  return `t_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
}

function mermaidLabel(text: string): string {
  return text.replace(/"/g, '#quot;');
}

/**
 * Target dependency graph as a Mermaid flowchart. Private links are dashed.
 */
export function renderTargetGraph(project: Project): string {
  const lines = ['flowchart LR'];
  const targets = project.getTargets();
  for (const target of targets) {
    lines.push(`  ${mermaidId(target.name)}["${mermaidLabel(`${target.name} (${target.kind})`)}"]`);
  }
  for (const target of targets) {
    for (const edge of target.linkLibs) {
      const arrow = edge.visibility === 'private' ? '-.->' : '-->';
      lines.push(`  ${mermaidId(target.name)} ${arrow} ${mermaidId(edge.target.name)}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

export class MermaidGenerator implements Generator {
  readonly name = 'mermaid';

  render(project: Project): GeneratedFile[] {
    return [{ path: FILE_PATTERNS.TARGET_GRAPH, content: renderTargetGraph(project) }];
  }
}
