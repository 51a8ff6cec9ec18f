import { Logger } from '../io';
import { statOrUndefined } from '../utils';
import { errorMessage } from './errors';
import { artifactFingerprint, GenerationStore } from './generationStore';
import { Target } from './target';
import { TargetGraph } from './targetGraph';
import { TargetId, TargetState } from './types';

/**
 * Decides freshness from build-generation markers. Raw timestamps are only used as identity of direct artifacts,
 * never to order a dependent against its prerequisites.
 */
export class StalenessEvaluator {
  constructor(
    private readonly graph: TargetGraph,
    private readonly store: GenerationStore,
    private readonly logger: Logger
  ) {}

  isUpToDate(target: Target): boolean {
    try {
      return this.evaluate(target, new Map());
    } catch (err) {
      this.logger.debug(`cannot evaluate ${target.id}: ${errorMessage(err)}`);
      return false;
    }
  }

  state(target: Target, building = false): TargetState {
    if (building) {
      return 'building';
    }
    if (!target.isDirect && this.graph.isTouched(target.id)) {
      return 'touched';
    }
    try {
      return this.evaluate(target, new Map()) ? 'up_to_date' : 'stale';
    } catch (err) {
      this.logger.debug(`cannot evaluate ${target.id}: ${errorMessage(err)}`);
      return 'unknown';
    }
  }

  /**
   * Token a dependent records for `target` when it is built: the generation of an indirect target, the fingerprint
   * of a direct one. `undefined` while the target has never been built or is missing.
   */
  inputToken(target: Target): string | undefined {
    if (target.isDirect) {
      return artifactFingerprint(target.path);
    }
    const marker = this.store.read(target);
    return marker ? `g${marker.generation}` : undefined;
  }

  generationOf(target: Target): number {
    if (target.isDirect) {
      return 0;
    }
    return this.store.read(target)?.generation ?? 0;
  }

  private evaluate(target: Target, memo: Map<TargetId, boolean>): boolean {
    const known = memo.get(target.id);
    if (known !== undefined) {
      return known;
    }
    const result = this.evaluateUncached(target, memo);
    memo.set(target.id, result);
    return result;
  }

  private evaluateUncached(target: Target, memo: Map<TargetId, boolean>): boolean {
    if (target.isDirect) {
      return !!statOrUndefined(target.path);
    }
    if (this.graph.isTouched(target.id) || !statOrUndefined(target.path)) {
      return false;
    }
    const marker = this.store.read(target);
    if (!marker) {
      return false;
    }
    const dependencies = this.graph.dependenciesOf(target);
    if (Object.keys(marker.inputs).length !== dependencies.length) {
      return false;
    }
    for (const dependency of dependencies) {
      const recorded = marker.inputs[dependency.id];
      if (recorded === undefined || !this.evaluate(dependency, memo)) {
        return false;
      }
      if (this.inputToken(dependency) !== recorded) {
        return false;
      }
      if (!dependency.isDirect && this.generationOf(dependency) >= marker.generation) {
        return false;
      }
    }
    return true;
  }
}
