export type InstallOptions = {
  editable?: boolean;
  noDeps?: boolean;
};

export type InstallerResult = {
  success: boolean;
  stdout: string;
  stderr: string;
};

export interface Installer {
  install(spec: string, options?: InstallOptions): Promise<InstallerResult>;
  uninstall(name: string): Promise<InstallerResult>;
}

export interface PackageIndex {
  listVersions(name: string): Promise<string[]>;
}
