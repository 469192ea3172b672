#!/usr/bin/env node
/**
 * Standalone runner for the WorkSpaces usage report.
 * Usage: workspaces-report --region us-east-1 --days 90 --ldap-url ldaps://dc01.corp.example.com --ldap-base-dn DC=corp,DC=example,DC=com
 */
import { Command } from "commander";
import { createReportCli } from "../src/cli/report-cli.js";

const program = new Command("workspaces-report");
createReportCli()(program);
await program.parseAsync(["node", "workspaces-report", "report", ...process.argv.slice(2)]);
