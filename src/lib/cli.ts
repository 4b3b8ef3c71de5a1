import fs from "node:fs/promises"
import { parseArgs } from "node:util"

import { createCompletionService } from "./completion"
import { loadConfig } from "./config"
import { PdfDocumentStore } from "./document-store"
import { suggestInterviewQuestions } from "./interview-questions"
import { analyzeJobDescription } from "./job-analyzer"
import { createLogger } from "./logger"
import { scoreMatch } from "./match-scorer"
import { answerInterviewQuestion, checkIntegrations, tailorApplication } from "./orchestrator"
import type { IntegrationStatus } from "./orchestrator"
import { buildAtsReport, formatAtsInsights } from "./report"

export const USAGE = `
Usage:
  ats-tailor score --job <file> --resume <file> [--json]
  ats-tailor tailor --job <file> --resume <file> [--cover-letter] [--out <dir>] [--name <name>]
  ats-tailor questions --job <file> [--resume <file>]
  ats-tailor answer --job <file> --resume <file> --question <text>
  ats-tailor check [--resume <file>] [--out <dir>]
`.trim()

const INTEGRATION_LABELS: ReadonlyArray<readonly [key: keyof IntegrationStatus, label: string]> = [
  ["openai", "OpenAI"],
  ["documentStore", "Document store"],
  ["baseResume", "Base resume"],
]

const logger = createLogger("cli")

const readText = async (file: string | undefined, flag: string) => {
  if (!file) {
    throw new Error(`Missing required option --${flag}.\n\n${USAGE}`)
  }
  return fs.readFile(file, "utf8")
}

/**
 * Runs one command and resolves to the process exit code. Only the commands
 * that talk to OpenAI or write files read the environment configuration.
 */
export const run = async (argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> => {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      job: { type: "string" },
      resume: { type: "string" },
      question: { type: "string" },
      out: { type: "string" },
      name: { type: "string" },
      json: { type: "boolean", default: false },
      "cover-letter": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  })

  const [command] = positionals
  if (values.help || !command) {
    console.log(USAGE)
    return command || values.help ? 0 : 1
  }

  switch (command) {
    case "score": {
      const jobText = await readText(values.job, "job")
      const resumeText = await readText(values.resume, "resume")
      const jobProfile = analyzeJobDescription(jobText)
      const match = scoreMatch(jobProfile, resumeText, jobText)
      if (values.json) {
        console.log(JSON.stringify({ match, report: buildAtsReport(jobProfile, match) }, null, 2))
      } else {
        formatAtsInsights(match).forEach((line) => console.log(line))
      }
      return 0
    }
    case "tailor": {
      const config = loadConfig(env)
      const result = await tailorApplication(
        {
          jobText: await readText(values.job, "job"),
          baseResume: await readText(values.resume, "resume"),
          coverLetter: values["cover-letter"],
          userName: values.name,
        },
        {
          completion: createCompletionService(config),
          store: new PdfDocumentStore(values.out ?? config.outputDir),
          userName: config.userName,
          jobDescriptionLimits: config.jobDescriptionLimits,
        },
      )
      logger.info(`Resume written to ${result.resumeDocument.location}`)
      if (result.coverLetterDocument) {
        logger.info(`Cover letter written to ${result.coverLetterDocument.location}`)
      }
      logger.info(`Finished in ${(result.processingTimeMs / 1000).toFixed(1)}s`)
      return 0
    }
    case "questions": {
      const jobText = await readText(values.job, "job")
      const resumeText = values.resume ? await readText(values.resume, "resume") : undefined
      suggestInterviewQuestions(jobText, resumeText).forEach((question, index) => {
        console.log(`${index + 1}. ${question}`)
      })
      return 0
    }
    case "answer": {
      const completion = createCompletionService(loadConfig(env))
      if (!completion) {
        throw new Error("Answering questions requires OPENAI_API_KEY.")
      }
      const answer = await answerInterviewQuestion(
        {
          question: values.question ?? "",
          jobText: await readText(values.job, "job"),
          resumeText: await readText(values.resume, "resume"),
        },
        completion,
      )
      console.log(answer)
      return 0
    }
    case "check": {
      const config = loadConfig(env)
      const resumeFile = values.resume
      const status = await checkIntegrations({
        completion: createCompletionService({ ...config, openai: { ...config.openai, maxRetries: 1 } }),
        store: new PdfDocumentStore(values.out ?? config.outputDir),
        loadBaseResume: resumeFile ? () => fs.readFile(resumeFile, "utf8") : undefined,
      })
      const entries = INTEGRATION_LABELS.map(([key, label]) => [label, status[key]] as const)
      entries.forEach(([label, ok]) => console.log(`${label}: ${ok ? "Connected" : "Failed"}`))
      const allGood = entries.every(([, ok]) => ok)
      console.log(
        allGood
          ? "All integrations are working correctly!"
          : "Some integrations need attention. Please check your configuration.",
      )
      return allGood ? 0 : 1
    }
    default:
      console.error(`Unknown command "${command}".\n\n${USAGE}`)
      return 1
  }
}
