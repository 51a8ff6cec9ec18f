import { spawn } from 'child_process';
import { z } from 'zod';

import { BuildAction, BuildContext, DeclareContext, ModuleKind, Target, TargetRef, TargetSpec } from '../engine';

const CommandTargetSchema = z.object({
  /** Shell command that writes the artifact. Without it the target is a direct one. */
  command: z.string().min(1).optional(),
  path: z.string().min(1),
  depends: z.union([z.record(z.string().min(1)), z.array(z.string().min(1))]).optional(),
  parallelizable: z.string().min(1).optional(),
  primary: z.boolean().optional(),
});

const CommandModuleConfigSchema = z.object({
  targets: z.record(CommandTargetSchema),
  env: z.record(z.string()).optional(),
});

export type CommandTargetConfig = z.infer<typeof CommandTargetSchema>;
export type CommandModuleConfig = z.infer<typeof CommandModuleConfigSchema>;

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Targets declared in the module declaration, each built by a shell command run in the module directory. The
 * command sees `STAGETREE_TARGET`, `STAGETREE_MODULE` and one `STAGETREE_DEP_<ROLE>` per prerequisite.
 */
export const commandModule: ModuleKind = {
  name: 'commands',
  declareTargets(context) {
    const config = CommandModuleConfigSchema.parse(context.config);
    return Object.entries(config.targets).map(
      ([name, target]): TargetSpec => ({
        name,
        path: target.path,
        action: target.command ? createCommandAction(target.command, config.env || {}) : undefined,
        depends: resolveDepends(context, target.depends),
        parallelizable: target.parallelizable,
        primary: target.primary,
      })
    );
  },
};

function resolveDepends(
  context: DeclareContext,
  depends: CommandTargetConfig['depends']
): Record<string, TargetRef> | undefined {
  if (!depends) {
    return undefined;
  }
  const entries: Array<[string, string]> = Array.isArray(depends)
    ? depends.map(ref => [roleOf(ref), ref])
    : Object.entries(depends);
  const result: Record<string, TargetRef> = {};
  for (const [role, ref] of entries) {
    result[role] = resolveRef(context, ref);
  }
  return result;
}

/**
 * `name` is a target of this module, `../name` one of the parent module, `<dir>#<name>` one of the module at `dir`
 * (relative to this module).
 */
export function resolveRef(context: DeclareContext, ref: string): TargetRef {
  const hash = ref.lastIndexOf('#');
  if (hash >= 0) {
    return context.resolve(ref.slice(0, hash)).target(ref.slice(hash + 1));
  }
  if (ref.startsWith('../')) {
    return context.requireParent().target(ref.slice('../'.length));
  }
  return ref;
}

function roleOf(ref: string): string {
  const hash = ref.lastIndexOf('#');
  if (hash >= 0) {
    return ref.slice(hash + 1);
  }
  return ref.startsWith('../') ? ref.slice('../'.length) : ref;
}

export function dependencyEnvName(role: string): string {
  return `STAGETREE_DEP_${role.toUpperCase().replace(/[^A-Z0-9]/gu, '_')}`;
}

export function commandEnv(context: BuildContext, extra: Readonly<Record<string, string>> = {}): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    ...extra,
    STAGETREE_TARGET: context.target.path,
    STAGETREE_MODULE: context.module.path,
  };
  for (const [role, dependency] of Object.entries(context.dependencies)) {
    env[dependencyEnvName(role)] = dependency.path;
  }
  return env;
}

function createCommandAction(command: string, extraEnv: Readonly<Record<string, string>>): BuildAction {
  return async context => {
    context.logger.debug(`$ ${command}`);
    const result = await runShellCommand(command, context.module.path, commandEnv(context, extraEnv));
    for (const line of result.stdout.split(/\r?\n/u).filter(Boolean)) {
      context.logger.debug(line);
    }
    if (result.code !== 0) {
      throw new Error(commandFailure(command, result, context.target));
    }
  };
}

function commandFailure(command: string, result: CommandResult, target: Target): string {
  const stderr = result.stderr.trim().split(/\r?\n/u).slice(-5).join('\n');
  return `command for ${target.name} exited with ${result.code ?? 'a signal'}: ${command}${stderr ? `\n${stderr}` : ''}`;
}

export function runShellCommand(command: string, cwd: string, env: NodeJS.ProcessEnv): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, { cwd, env, shell: true, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (data: string) => {
      stdout += data;
    });
    child.stderr.on('data', (data: string) => {
      stderr += data;
    });
    child.on('error', reject);
    child.on('close', code => resolve({ code, stdout, stderr }));
  });
}
