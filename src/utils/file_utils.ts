import { existsSync, mkdirSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import * as logger from "./logger.js";

/**
 * Ensure a directory exists, creating it if necessary
 * @param dirPath Path to the directory
 * @returns True if successful, false otherwise
 */
export function ensureDir(dirPath: string): boolean {
  try {
    if (!existsSync(dirPath)) {
      mkdirSync(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
    return true;
  } catch (error) {
    logger.error(`Failed to create directory ${dirPath}: ${error}`);
    return false;
  }
}

/**
 * Read data from a file
 * @param filePath Path to the file
 * @returns Promise that resolves to the file contents or null if error
 */
export async function readFromFile(filePath: string): Promise<string | null> {
  try {
    if (!existsSync(filePath)) {
      logger.error(`File does not exist: ${filePath}`);
      return null;
    }

    const content = await readFile(filePath, "utf-8");
    logger.debug(`Read from file: ${filePath}`);
    return content;
  } catch (error) {
    logger.error(`Failed to read from file ${filePath}: ${error}`);
    return null;
  }
}

/**
 * Read a whole stream as UTF-8 text
 * @param stream Usually process.stdin
 */
export async function readFromStream(
  stream: NodeJS.ReadableStream
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Reads the HTML export from a file, or from the given stream when no path
 * is set.
 * @returns The document, or null if the file could not be read
 */
export async function readInput(
  filePath: string | undefined,
  stdin: NodeJS.ReadableStream
): Promise<string | null> {
  if (filePath) {
    return readFromFile(filePath);
  }
  logger.debug("Reading HTML from stdin");
  return readFromStream(stdin);
}

/**
 * Write data to a file, ensuring its directory exists
 * @param filePath Path to the file
 * @param content Text to write
 * @returns Promise that resolves to true if successful
 */
export async function writeToFile(
  filePath: string,
  content: string
): Promise<boolean> {
  try {
    const dir = dirname(filePath);
    if (!ensureDir(dir)) {
      return false;
    }

    await writeFile(filePath, content, "utf-8");
    logger.debug(`Wrote to file: ${filePath}`);
    return true;
  } catch (error) {
    logger.error(`Failed to write to file ${filePath}: ${error}`);
    return false;
  }
}

/**
 * Writes the output document to a file, or to the given stream when no
 * path is set.
 * @returns True if successful
 */
export async function writeOutput(
  filePath: string | undefined,
  content: string,
  stdout: NodeJS.WritableStream
): Promise<boolean> {
  if (filePath) {
    return writeToFile(filePath, content);
  }
  return new Promise((resolve) => {
    stdout.write(content, (error) => {
      if (error) {
        logger.error(`Failed to write to stdout: ${error}`);
        resolve(false);
      } else {
        resolve(true);
      }
    });
  });
}
