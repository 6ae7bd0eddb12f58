import ts from 'typescript'

/**
 * Parsed default library files, shared by every program created here.
 */
const libraryFiles = new Map<string, ts.SourceFile>()

/**
 * A program holding one in-memory source file.
 */
export interface SourceProgram {
  program: ts.Program
  sourceFile: ts.SourceFile
}

/**
 * Creates a program whose only root is an in-memory source text. Library
 * declarations and imported modules are still read from disk; default
 * library files are parsed once per process.
 *
 * @param sourceText - TypeScript source
 * @param fileName - Absolute name the source is known by
 * @param options - Compiler options
 * @returns The program and the parsed source file
 */
export function createSourceProgram(sourceText: string, fileName: string, options: ts.CompilerOptions): SourceProgram {
  const rootName = fileName.replace(/\\/g, '/')
  const parsed = ts.createSourceFile(rootName, sourceText, options.target ?? ts.ScriptTarget.ES2022, true)

  const baseHost = ts.createCompilerHost(options, true)
  const libraryDir = baseHost.getDefaultLibLocation?.()
  const host: ts.CompilerHost = {
    ...baseHost,
    getSourceFile: (name, languageVersionOrOptions, onError, shouldCreateNewSourceFile) => {
      if (name === rootName) {
        return parsed
      }
      if (libraryDir === undefined || !name.startsWith(libraryDir)) {
        return baseHost.getSourceFile(name, languageVersionOrOptions, onError, shouldCreateNewSourceFile)
      }

      const languageVersion =
        typeof languageVersionOrOptions === 'number' ? languageVersionOrOptions : languageVersionOrOptions.languageVersion
      const key = `${languageVersion}:${name}`
      let library = libraryFiles.get(key)
      if (!library) {
        library = baseHost.getSourceFile(name, languageVersionOrOptions, onError, shouldCreateNewSourceFile)
        if (library) {
          libraryFiles.set(key, library)
        }
      }
      return library
    },
    fileExists: (name) => name === rootName || baseHost.fileExists(name),
    readFile: (name) => (name === rootName ? sourceText : baseHost.readFile(name)),
  }

  const program = ts.createProgram({ rootNames: [rootName], options, host })
  return { program, sourceFile: program.getSourceFile(rootName) ?? parsed }
}
