export interface SiteInput {
  hostname: string;
  runDir: string;
  installDir: string;
}

export type SiteBindings = {
  installation: {
    system: { hostname: string };
    paths: { run_dir: string; install_dir: string };
  };
};

export const buildSiteBindings = ({ hostname, runDir, installDir }: SiteInput): SiteBindings => ({
  installation: {
    system: { hostname },
    paths: { run_dir: runDir, install_dir: installDir },
  },
});
