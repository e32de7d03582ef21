import Joi, { ObjectSchema } from "joi";
import { readFileSync } from "node:fs";
import { join } from "node:path";

interface Metadata {
  name: string;
  version: string;
}
const metadataSchema: ObjectSchema<Metadata> = Joi.object({
  name: Joi.string().required(),
  version: Joi.string().required(),
}).unknown();

const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../../package.json"), "utf8")
);
export const { name, version } = Joi.attempt(packageJson, metadataSchema);
