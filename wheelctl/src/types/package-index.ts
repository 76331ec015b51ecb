/** Subset of the package index JSON API response that the resolver reads. */
export type ReleaseFile = {
  packagetype: string;
  url: string;
  filename?: string;
};

export type PackageMetadata = {
  info: {
    name?: string;
    version: string;
  };
  urls: ReleaseFile[];
};

export type ResolvedVersion = {
  version: string;
  sdistUrl: string;
};
