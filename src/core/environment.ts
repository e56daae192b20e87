import nunjucks from 'nunjucks';

// Shell text must come out verbatim: no HTML escaping, and block tags own their line.
const environment = new nunjucks.Environment(null, {
  autoescape: false,
  trimBlocks: true,
  lstripBlocks: true
});

export function renderTemplate(template: string, context: object): string {
  return environment.renderString(template, context);
}
