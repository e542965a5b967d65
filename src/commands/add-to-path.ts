import chalk from "chalk";
import { UserPathManager, validateDirectory } from "../services/user-path.js";

export async function addToPathCommand(manager: UserPathManager, input: string): Promise<string> {
  const dir = await validateDirectory(input);
  const { added } = await manager.addToPath(dir);
  const info = chalk.blue("INFO");
  return added
    ? `${info} : Added ${chalk.green(`'${dir}'`)} successfully to the PATH.`
    : `${info} : Path already exists.`;
}
