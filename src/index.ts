// src/index.ts

import { parseArgs } from "node:util";

import { loadSourceConfig } from "./config/SourceConfig.ts";
import { DataHub } from "./directory/DataHub.ts";
import { makeManualAddress } from "./directory/AddressDirectory.ts";
import { buildAssistanceRequest, buildDispatchRequest, parseManualUnits } from "./dispatch/DispatchRequest.ts";
import { DispatchClient } from "./dispatch/DispatchClient.ts";
import { ValidationError } from "./model/Errors.ts";
import { CalloutResolver, extractIncidentCode } from "./rules/CalloutResolver.ts";
import type { CalloutAddress, Priority } from "./model/Models.ts";
import type { PreparedDispatch } from "./dispatch/DispatchRequest.ts";
import { createLogger } from './utils/Logger.ts';

//central logger init
const logger = createLogger('app');

const USAGE = `Usage: npm start -- --street <name> --house <no> [--letter <x>] [--postcode <pc>]
                 (--incident <code> [--district <no>] [--secondary] | --text <incident text> --units <u1,u2>)
                 [--priority prio1|prio2] [--comment <text>] [--submit]`;

interface CliOptions {
  street: string;
  houseNo: string;
  houseLetter: string;
  postcode: string;
  district: string;
  incident: string;
  secondary: boolean;
  /** manual assistance callout: operator-chosen text and units */
  assistance?: { text: string; units: string };
  priority: Priority;
  comment?: string;
  submit: boolean;
}

function parseCli(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      street: { type: "string" },
      house: { type: "string" },
      letter: { type: "string", default: "" },
      postcode: { type: "string", default: "" },
      district: { type: "string", default: "" },
      incident: { type: "string" },
      secondary: { type: "boolean", default: false },
      text: { type: "string" },
      units: { type: "string" },
      priority: { type: "string", default: "prio1" },
      comment: { type: "string" },
      submit: { type: "boolean", default: false },
    },
  });

  const assistance = values.units !== undefined || values.text !== undefined
    ? { text: values.text ?? "", units: values.units ?? "" }
    : undefined;
  const incident = extractIncidentCode(values.incident ?? "");

  if (!values.street || !values.house || (!incident && !assistance)) {
    throw new ValidationError(`street, house and incident (or text and units) are required\n${USAGE}`);
  }
  if (values.priority !== "prio1" && values.priority !== "prio2") {
    throw new ValidationError(`priority must be prio1 or prio2, got '${values.priority}'`);
  }

  return {
    street: values.street,
    houseNo: values.house,
    houseLetter: values.letter ?? "",
    postcode: values.postcode ?? "",
    district: values.district ?? "",
    incident,
    secondary: values.secondary ?? false,
    assistance,
    priority: values.priority,
    comment: values.comment,
    submit: values.submit ?? false,
  };
}

/**
 * Exact component match first (narrowed by postcode when given), then the
 * fuzzy street search, then a manual address.
 */
function findAddress(hub: DataHub, opts: CliOptions): CalloutAddress {
  const byPostcode = (a: { postcode: string }) => !opts.postcode || a.postcode === opts.postcode;

  const exact = hub.addresses
    .findByComponents(opts.street, opts.houseNo, opts.houseLetter)
    .filter(byPostcode);
  if (exact.length > 0) {
    if (exact.length > 1) {
      logger.warn(`${exact.length} addresses match, using '${exact[0].display}'`);
    }
    return exact[0];
  }

  const fuzzy = hub.addresses
    .findFuzzyStreetHouse(opts.street, opts.houseNo, opts.houseLetter)
    .filter(byPostcode);
  if (fuzzy.length > 0) {
    logger.info(`No exact address match, closest is '${fuzzy[0].display}'`);
    return fuzzy[0];
  }

  logger.warn("Address not in the address directory, using it as entered");
  return makeManualAddress({
    street: opts.street,
    houseNo: opts.houseNo,
    houseLetter: opts.houseLetter,
    postcode: opts.postcode,
    city: hub.postcodes.cityForPostcode(opts.postcode),
    districtNo: opts.district,
  });
}

interface Preview {
  heading: string[];
  units: string[];
  prepared: PreparedDispatch;
}

function prepareCallout(hub: DataHub, opts: CliOptions, address: CalloutAddress): Preview {
  if (opts.assistance) {
    const prepared = buildAssistanceRequest(address, opts.assistance.text, opts.assistance.units, hub.taskMap, {
      priority: opts.priority,
      comments: opts.comment,
    });
    return {
      heading: [`Assistance — ${opts.assistance.text}`, `Address:  ${address.display}`],
      units: parseManualUnits(opts.assistance.units),
      prepared,
    };
  }

  const resolver = new CalloutResolver(hub.incidents, hub.aba);
  const resolved = resolver.resolve(address, opts.incident, opts.secondary);
  const prepared = buildDispatchRequest(resolved, hub.taskMap, {
    priority: opts.priority,
    comments: opts.comment,
  });

  const heading = [
    `${resolved.incidentCode} — ${resolved.incidentLabel}`,
    `Address:  ${resolved.address.display} (district ${resolved.districtNo || '?'})`,
  ];
  if (resolved.abaSite) {
    heading.push(`ABA site: ${resolved.abaSite.doaNo} ${resolved.abaSite.name}`);
  }
  heading.push(`ABA rule: ${resolved.abaRuleResult.reason}`);

  return { heading, units: resolved.finalUnits, prepared };
}

async function main() {
  const opts = parseCli(process.argv.slice(2));
  const config = loadSourceConfig();

  const hub = await DataHub.fromConfig(config);

  const address = findAddress(hub, opts);
  const preview = prepareCallout(hub, opts, address);

  printPreview(preview);

  if (!opts.submit) {
    logger.info("Preview only, pass --submit to send the callout");
    return;
  }

  const { username, password, clientId } = config.dispatch;
  if (!username || !password) {
    throw new ValidationError("DISPATCH_USERNAME and DISPATCH_PASSWORD must be set to submit");
  }

  const client = new DispatchClient(config.dispatch);
  await client.loginWithPassword(username, password, clientId);
  const created = await client.createIncident(preview.prepared.request);
  logger.info({ incident: created }, "Callout submitted");
}

function printPreview({ heading, units, prepared }: Preview) {
  const { request, tasks } = prepared;

  console.log('\n' + '═'.repeat(80));
  for (const line of heading) {
    console.log(`  ${line}`);
  }
  console.log('─'.repeat(80));
  console.log(`  Units:    ${units.join(' ') || '(none)'}`);
  console.log(`  Task ids: ${request.taskIds.join(', ')}`);
  if (tasks.assistanceUnit) {
    console.log(`  Assistance added: ${tasks.assistanceUnit}`);
  }
  console.log('─'.repeat(80));
  console.log(`  ${request.body}`);
  console.log('═'.repeat(80) + '\n');
}

try {
  await main();
} catch (err) {
  logger.error({ err }, "Callout failed");
  process.exitCode = 1;
}
