import type { z } from 'zod';
import type {
  CompileCheckSchema,
  DependencySchema,
  ManifestSchema,
  SystemPackageSchema,
} from '../config/schema.js';

export type CompileCheck = z.infer<typeof CompileCheckSchema>;
export type SystemPackage = z.infer<typeof SystemPackageSchema>;
export type DependencySpec = z.infer<typeof DependencySchema>;
export type Manifest = z.infer<typeof ManifestSchema>;
