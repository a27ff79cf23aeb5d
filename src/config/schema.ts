import { z } from 'zod';

// ── Shared sub-schemas ──────────────────────────────────────────────

const OsSchema = z.enum(['windows', 'linux', 'macos']);

export const CompileCheckSchema = z.object({
  include_lines: z.array(z.string()).default([]),
  code: z.string().default('int main(){return 0;}'),
  defines: z.array(z.string()).default([]),
  link_libs: z.array(z.string()).default([]),
});

export const VerifySchema = z.object({
  header: z.string().min(1).optional(),
  lib_name: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  compile_check: CompileCheckSchema.optional(),
});

export const SystemPackageSchema = z.object({
  platforms: z.array(OsSchema).min(1),
  pkg_config: z.array(z.string().min(1)).default([]),
  headers: z.array(z.string().min(1)).default([]),
});

export const PlatformOptionsSchema = z
  .object({
    windows: z.array(z.string()).optional(),
    linux: z.array(z.string()).optional(),
    macos: z.array(z.string()).optional(),
  })
  .strict();

// ── Dependency entries ──────────────────────────────────────────────

const namePattern = /^[A-Za-z0-9][A-Za-z0-9_.+-]*$/;

export const DEPENDENCY_KINDS = ['cmake', 'check'] as const;

export const DependencySchema = z
  .object({
    name: z.string().regex(namePattern, 'Alphanumeric with . _ + -'),
    repo: z.string().min(1).optional(),
    tag: z.string().min(1).optional(),
    kind: z.enum(DEPENDENCY_KINDS).default('cmake'),
    cmake_options: z.array(z.string()).default([]),
    platform_options: PlatformOptionsSchema.optional(),
    system_package: SystemPackageSchema.optional(),
    verify: VerifySchema.default({}),
  })
  .refine((dep) => dep.kind !== 'cmake' || dep.repo !== undefined, {
    message: 'cmake dependencies need a repo',
    path: ['repo'],
  });

export const ManifestSchema = z
  .object({
    deps: z.array(DependencySchema).nullable().default([]),
  })
  .transform((m) => ({ deps: m.deps ?? [] }))
  .superRefine((m, ctx) => {
    const seen = new Set<string>();
    m.deps.forEach((dep, i) => {
      if (seen.has(dep.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate dependency name "${dep.name}"`,
          path: ['deps', i, 'name'],
        });
      }
      seen.add(dep.name);
    });
  });
