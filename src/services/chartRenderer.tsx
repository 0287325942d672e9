import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import FootballFieldChart, { type FootballFieldChartProps } from '../components/FootballFieldChart';

/** Renders the football field as a standalone HTML document with an inline SVG chart. */
export const renderFootballField = (props: FootballFieldChartProps): string => {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{props.title}</title>
      </head>
      <body>
        <FootballFieldChart {...props} />
      </body>
    </html>
  );
  return `<!DOCTYPE html>${markup}\n`;
};

export const chartFileName = (ticker: string): string => `football_field_${ticker.trim().toUpperCase()}.html`;
