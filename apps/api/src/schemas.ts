import { z } from 'zod'

const DependencyMapSchema = z.record(z.string(), z.string())

export const PythonAnalyzeBody = z.object({
  packages: z.array(z.string())
})

export const NpmAnalyzeBody = z.object({
  dependencies: DependencyMapSchema.nullish(),
  devDependencies: DependencyMapSchema.nullish()
})

export const CheckPackageBody = z.object({
  name: z.string().trim().min(1),
  version: z.string().nullish()
})

export const CheckPackageQuery = z.object({
  ecosystem: z.enum(['python', 'npm'], {
    errorMap: () => ({ message: "Ecosystem must be 'python' or 'npm'" })
  })
})

export type PythonAnalyzeBody = z.infer<typeof PythonAnalyzeBody>
export type NpmAnalyzeBody = z.infer<typeof NpmAnalyzeBody>
