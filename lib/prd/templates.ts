/**
 * Document skeletons, one per PRD format.
 *
 * Each skeleton carries `{product_name}`, `{date}` and `{quarter}` placeholders
 * plus italic bracketed instructions the model replaces with real content.
 * Date and quarter are resolved here; the product name is filled by the
 * prompt builder.
 */

import {
  DEFAULT_FORMAT,
  DOCUMENT_FORMATS,
  type DocumentFormat,
  type FormatDefinition,
} from "./types";

export const FORMAT_REGISTRY: Record<DocumentFormat, FormatDefinition> = {
  standard: {
    id: "standard",
    name: "Standard PRD",
    description: "Full eleven-section PRD for complex features",
  },
  one_page: {
    id: "one_page",
    name: "One-Page PRD",
    description: "Concise single page for quick alignment",
  },
  agile_epic: {
    id: "agile_epic",
    name: "Agile Epic",
    description: "Sprint-oriented epic with a user story map",
  },
  feature_brief: {
    id: "feature_brief",
    name: "Feature Brief",
    description: "Lightweight, hypothesis-driven exploration brief",
  },
};

// ---------------------------------------------------------------------------
// Skeletons
// ---------------------------------------------------------------------------

const STANDARD_SKELETON = `Using the product inputs above, write a complete, production-quality Standard PRD. Every section must contain specific, realistic detail; leave no placeholders behind.

---

# {product_name}
### Product Requirements Document

| | |
|---|---|
| **Version** | 1.0 |
| **Date** | {date} |
| **Status** | Draft |
| **Author** | [PM Name] |

---

## 1. Executive Summary

*(One paragraph: the problem, the solution, the business impact and the headline metrics)*

## 2. Problem Definition

### 2.1 Customer Problem
*(Who is affected, what exactly hurts, how often it happens and why it matters now)*

### 2.2 Market Opportunity
*(Market size, competitive landscape, why the timing is right)*

### 2.3 Business Case
*(Revenue potential, cost savings, strategic fit, cost of doing nothing)*

## 3. Solution Overview

### 3.1 Proposed Solution
*(What we are building, its key capabilities and how users experience it)*

### 3.2 In Scope
*(Bullet list of features included in this release)*

### 3.3 Out of Scope
*(Bullet list of what we are explicitly not building)*

### 3.4 MVP Definition
*(Minimum feature set, success criteria and learning goals)*

## 4. User Stories & Requirements

### 4.1 User Stories
*(4–6 stories as "As a [persona], I want [capability] so that [benefit]", each with an acceptance criteria checklist)*

### 4.2 Functional Requirements
*(Table: ID | Requirement | Priority | Notes, at least 6 rows ranked P0/P1/P2)*

### 4.3 Non-Functional Requirements
*(Performance targets, scalability, security, reliability, accessibility)*

## 5. Design & User Experience

### 5.1 Design Principles
*(Three principles that guide this feature)*

### 5.2 Key Screens & Flows
*(The main user flows, step by step)*

## 6. Technical Specifications

### 6.1 Architecture Overview
*(High-level architecture and key components)*

### 6.2 API / Integration Points
*(New or changed endpoints and third-party integrations)*

### 6.3 Data Model
*(Key entities and how they relate)*

### 6.4 Security & Compliance
*(Auth model, encryption, PII handling, regulatory notes)*

## 7. Go-to-Market Strategy

### 7.1 Launch Plan
*(Phased rollout: beta, limited release, general availability)*

### 7.2 Success Metrics
*(Table: Metric | Current Baseline | Target | Measurement Method)*

## 8. Risks & Mitigations

*(Table: Risk | Probability | Impact | Mitigation, at least 4 rows)*

## 9. Timeline & Milestones

*(Table: Milestone | Target Week | Deliverables | Success Criteria)*

## 10. Team & Resources

*(Engineering, design and QA headcount; budget estimate)*

## 11. Open Questions

*(Numbered list of questions that must be answered before development starts)*
`;

const ONE_PAGE_SKELETON = `Using the product inputs above, write a crisp, complete One-Page PRD. Every field needs specific, realistic content; leave no placeholders behind.

---

# {product_name}
### One-Page PRD

**Date**: {date} &nbsp;|&nbsp; **Status**: Draft

---

## Problem
*(2–3 sentences: the problem, who has it and why it matters)*

## Solution
*(2–3 sentences: what we are building and how it solves the problem)*

## Why Now?
*(Three bullets on urgency)*

## Success Metrics

| Metric | Current | Target |
|--------|---------|--------|
| *(KPI 1)* | | |
| *(KPI 2)* | | |
| *(KPI 3)* | | |

## Scope
**In**: *(comma-separated features)*
**Out**: *(explicit exclusions)*

## User Flow
\`\`\`
[Step 1] → [Step 2] → [Step 3] → ✓ Done
\`\`\`

## Risks
1. *(Risk)* → *(Mitigation)*
2. *(Risk)* → *(Mitigation)*

## Timeline
| Phase | Duration |
|-------|----------|
| Design | |
| Development | |
| Testing | |
| Launch | |

## Resources
*(Engineering, design and QA headcount)*

## Open Questions
1. *(Question?)*
`;

const AGILE_EPIC_SKELETON = `Using the product inputs above, write a complete Agile Epic. Fill every section with specific, realistic content; leave no placeholders behind.

---

# {product_name}
### Agile Epic

| | |
|---|---|
| **Epic ID** | EPIC-001 |
| **Quarter** | {quarter} |
| **Status** | Discovery |

---

## Problem Statement
*(2–3 sentences)*

## Goals & Objectives
1. *(Objective 1)*
2. *(Objective 2)*
3. *(Objective 3)*

## Success Metrics
| Metric | Target | How Measured |
|--------|--------|--------------|
| | | |

## User Story Map

| Story ID | User Story | Priority | Story Points | Status |
|----------|-----------|----------|--------------|--------|
| US-001 | As a… | P0 | | To Do |
| US-002 | As a… | P0 | | To Do |
| US-003 | As a… | P1 | | To Do |
| US-004 | As a… | P1 | | To Do |

## Sprint Breakdown
*(A two-sprint delivery plan with concrete deliverables per sprint)*

## Dependencies
*(Teams or systems this epic relies on)*

## Acceptance Criteria
- [ ] *(Criterion 1)*
- [ ] *(Criterion 2)*
- [ ] *(Criterion 3)*
- [ ] Performance targets met
- [ ] Security review passed

## Definition of Done
*(Full checklist for closing the epic)*

## Risks & Blockers
*(Known risks that could affect delivery)*
`;

const FEATURE_BRIEF_SKELETON = `Using the product inputs above, write a complete Feature Brief. Fill every field with specific, realistic content; leave no placeholders behind.

---

# {product_name}
### Feature Brief

**Date**: {date}

---

## Context
*(Why are we looking at this, and what triggered the exploration?)*

## Hypothesis
> We believe that **[building this feature]**
> for **[these users]**
> will **[achieve this specific outcome]**.
> We'll know we're right when **[we observe this measurable signal]**.

## Proposed Approach
*(High-level approach in 4–6 sentences)*

## Key Assumptions
*(Assumptions this brief rests on and what we need to validate)*

## Effort Estimate
- **Size**: *(XS / S / M / L / XL)*
- **Confidence**: *(High / Medium / Low)*
- **Rough Timeline**: *(e.g. 2 sprints)*

## Success Signal
*(The single metric that tells us the feature worked)*

## Alternatives Considered
*(Approaches we rejected and why)*

## Next Steps
- [ ] User research / interviews
- [ ] Design exploration
- [ ] Technical spike
- [ ] Stakeholder review
- [ ] Decision: build / shelve / revisit
`;

const SKELETONS: Record<DocumentFormat, string> = {
  standard: STANDARD_SKELETON,
  one_page: ONE_PAGE_SKELETON,
  agile_epic: AGILE_EPIC_SKELETON,
  feature_brief: FEATURE_BRIEF_SKELETON,
};

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export function isDocumentFormat(value: unknown): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/**
 * Map an arbitrary format value onto a known format. Unknown values fall back
 * to the standard PRD instead of failing.
 */
export function resolveFormat(value: unknown): DocumentFormat {
  return isDocumentFormat(value) ? value : DEFAULT_FORMAT;
}

/** e.g. "October 05, 2026" */
export function formatDocumentDate(now: Date): string {
  return now.toLocaleDateString("en-US", {
    month: "long",
    day: "2-digit",
    year: "numeric",
  });
}

/** e.g. "Q4 2026" */
export function formatQuarter(now: Date): string {
  const quarter = Math.floor(now.getMonth() / 3) + 1;
  return `Q${quarter} ${now.getFullYear()}`;
}

/**
 * Return the skeleton for a format with `{date}` and `{quarter}` resolved from
 * `now`. `{product_name}` is left in place.
 */
export function skeletonFor(format: unknown, now: Date = new Date()): string {
  const date = formatDocumentDate(now);
  const quarter = formatQuarter(now);

  return SKELETONS[resolveFormat(format)]
    .replaceAll("{date}", () => date)
    .replaceAll("{quarter}", () => quarter);
}
