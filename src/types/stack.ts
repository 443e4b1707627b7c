export interface Stack {
  stackName: string;
  /** Canonical (realpath) directory; the stack's identity. */
  stackPath: string;
  relativePath: string;
  workingDirectory: string;
  dependsOn: readonly string[];
  skipOnDestroy: boolean;
  varFiles: readonly string[];
  envFiles: readonly string[];
}

export interface StackDeclaration {
  name: string | null;
  dependsOn: string[];
  skipOnDestroy: boolean;
}
