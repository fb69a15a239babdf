import { posix } from 'path';
import { InvalidDescriptionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { FileNode, type BuildStep, type Node } from '../node.js';
import type { Project } from '../project.js';
import { Target, type InstallSource } from '../target.js';
import { expandSources } from './sources.js';

/**
 * Replays deferred install operations once every build target has outputs.
 */
export class InstallFactory {
  constructor(private readonly project: Project) {}

  resolve(target: Target): FileNode[] {
    const outputs: FileNode[] = [];

    for (const operation of target.pendingSources) {
      if (operation.kind === 'install') {
        for (const source of operation.sources) {
          for (const file of this.filesOf(target, source)) {
            outputs.push(this.copy(target, file, posix.join(operation.dest, posix.basename(file.path))));
          }
        }
      } else {
        const files = this.filesOf(target, operation.source);
        if (files.length !== 1) {
          throw new InvalidDescriptionError(
            `'${target.name}' installs to one path (${operation.dest}) but its source has ${files.length} files`,
            target.origin
          );
        }
        outputs.push(this.copy(target, files[0], operation.dest));
      }
    }

    target.pendingSources.splice(0, target.pendingSources.length);
    target.markResolved({ outputNodes: outputs, objectNodes: [], languages: [] });
    logger.debug(`Resolved ${target.kind} target '${target.name}' (${outputs.length} files)`);
    return outputs;
  }

  private filesOf(target: Target, source: InstallSource): FileNode[] {
    const nodes: readonly Node[] =
      source instanceof Target ? source.outputNodes : expandSources(this.project, [source], target.origin);
    return nodes.filter((node): node is FileNode => node instanceof FileNode);
  }

  private copy(target: Target, source: FileNode, dest: string): FileNode {
    const output = this.project.registry.file(dest, target.origin);
    const step: BuildStep = {
      action: 'copy',
      tool: 'copy',
      command: this.project.config.copyCommand,
      sources: [source],
      outputs: [output],
      variables: new Map(),
      description: 'INSTALL $$out',
      target: target.name,
      origin: target.origin
    };
    output.setProducer(step);
    return output;
  }
}
