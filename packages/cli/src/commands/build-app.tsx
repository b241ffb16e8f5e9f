import React from 'react';
import { Box, Text } from 'ink';
import { runBuild, runInstall } from '@packwright/core';
import type { BuildOptions, BuildResult, InstallOptions } from '@packwright/core';
import { DataTable } from '../ui/components/data-table.js';
import { renderPipeline } from '../ui/pipeline-app.js';

function BuildSummary({ result }: { result: BuildResult }): React.ReactElement {
  const rows = [
    ...result.succeeded.map((id) => ({
      component: id,
      status: 'ok',
      files: result.perComponentFiles[id]?.length ?? 0,
      detail: '',
    })),
    ...result.failures.map((f) => ({
      component: f.componentId,
      status: f.code,
      files: f.partialPaths.length,
      detail: f.action ? `${f.action}: ${f.message}` : f.message,
    })),
  ];

  return (
    <Box flexDirection="column" marginTop={1}>
      <DataTable rows={rows} flagged={(row) => row.status !== 'ok'} />
      {result.archivePath ? <Text color="green">Pack: {result.archivePath}</Text> : null}
      <Text bold>
        {String(result.succeeded.length)} succeeded, {String(result.failures.length)} failed
      </Text>
    </Box>
  );
}

const summary = (result: BuildResult): React.ReactNode => <BuildSummary result={result} />;

export function runBuildApp(options: BuildOptions): Promise<BuildResult | undefined> {
  return renderPipeline((reporter) => runBuild(options, reporter), summary);
}

export function runInstallApp(options: InstallOptions): Promise<BuildResult | undefined> {
  return renderPipeline((reporter) => runInstall(options, reporter), summary);
}
