/** Appends `pathname` to `baseUrl`, keeping any path prefix the base already has. */
export const joinUrlPath = (baseUrl: string, pathname: string): URL =>
  new URL(`${baseUrl.replace(/\/+$/, "")}${pathname}`);
