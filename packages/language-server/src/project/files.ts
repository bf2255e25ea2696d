import path from "node:path";
import { URI } from "vscode-uri";

export const toFileUri = (filePath: string): string =>
  URI.file(path.resolve(filePath)).toString();

export const toFilePath = (uri: string): string => path.resolve(URI.parse(uri).fsPath);
