const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
]

const markdownRegex = /\*\*|\*|_/g
const yearRegex = /\b20\d{2}\b/
const closingWords = ["sincerely", "regards", "best"]

const trimBlankEdges = (lines: string[]) => {
  const start = lines.findIndex((line) => line.length > 0)
  if (start === -1) return []
  const end = lines.length - [...lines].reverse().findIndex((line) => line.length > 0)
  return lines.slice(start, end)
}

const cleanLines = (text: string) =>
  trimBlankEdges(
    text
      .replace(markdownRegex, "")
      .split(/\r?\n/)
      .map((line) => line.trim()),
  )

export const cleanGeneratedText = (text: string): string => cleanLines(text).join("\n")

export const formatLetterDate = (date: Date) =>
  `${MONTHS[date.getMonth()]} ${String(date.getDate()).padStart(2, "0")}, ${date.getFullYear()}`

export const cleanCoverLetterOutput = (text: string, userName: string, now: Date = new Date()): string => {
  const lines = cleanLines(text)
  const output: string[] = []

  if (!lines.slice(0, 3).some((line) => yearRegex.test(line))) {
    output.push(formatLetterDate(now), "")
  }

  output.push(...lines)

  const lastLine = (lines[lines.length - 1] ?? "").toLowerCase()
  if (!closingWords.some((word) => lastLine.includes(word))) {
    output.push("", "Sincerely,", userName)
  }

  return output.join("\n")
}

const TITLE_PREFIXES = ["position:", "role:", "job title:", "title:"]
const COMPANY_PREFIXES = ["company:", "organization:", "employer:"]
const HEADER_LINES = 10

const valueAfterColon = (line: string) => line.slice(line.indexOf(":") + 1).trim()

export const extractCompanyAndJobTitle = (jobText: string): { company: string; jobTitle: string } => {
  const lines = jobText.split(/\r?\n/).slice(0, HEADER_LINES)
  let jobTitle = "Position"
  let company = "Company"

  for (const [index, line] of lines.entries()) {
    const lower = line.toLowerCase().trim()
    if (TITLE_PREFIXES.some((prefix) => lower.includes(prefix))) {
      jobTitle = valueAfterColon(line)
      break
    }
    const trimmed = line.trim()
    if (index === 0 && trimmed.length > 0 && trimmed.length < 100) {
      jobTitle = trimmed
    }
  }

  const companyLine = lines.find((line) => COMPANY_PREFIXES.some((prefix) => line.toLowerCase().includes(prefix)))
  if (companyLine) {
    company = valueAfterColon(companyLine)
  }

  return { company, jobTitle }
}

const toFileToken = (value: string) =>
  value
    .trim()
    .replace(/[\s-]/g, "_")
    .replace(/[^\p{L}\p{N}_]/gu, "")

const toTitleCase = (value: string) =>
  value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase())

export const formatDocumentTitle = (userName: string, jobTitle: string) => {
  const job = toFileToken(jobTitle || "Position").toUpperCase() || "POSITION"
  const user = toFileToken(userName) || "Candidate"
  return `${user}_${job}`
}

export const formatCoverLetterTitle = (company: string) => {
  const name = toTitleCase(toFileToken(company || "Company")) || "Company"
  return `${name}_Cover_Letter`
}

export function asciiSafe(s: string) {
  return s
    .replace(/[•–—│]/g, "-")
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .replace(/[ \t]{2,}/g, " ")
    .trim()
}
