import * as packageJson from "../package.json";

export const FSMAN_VERSION: string = packageJson.version;
