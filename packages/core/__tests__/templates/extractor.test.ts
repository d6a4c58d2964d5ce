/**
 * Reference extractor tests
 */

import { describe, it, expect } from 'vitest';
import { extractReferences } from '../../src/templates/extractor.js';
import { ParseError } from '../../src/errors.js';

const FILE = 'templates/deployment.yaml';

describe('Reference extractor', () => {
  it('should extract references with 1-based line numbers', () => {
    const template = [
      'apiVersion: apps/v1',
      'kind: Deployment',
      'spec:',
      '  replicas: {{ .Values.replicaCount }}',
      '  image: "{{ .Values.image.repository }}:{{.Values.image.tag}}"',
    ].join('\n');

    expect(extractReferences(template, FILE)).toEqual([
      { name: 'replicaCount', file: FILE, line: 4, fullText: '{{ .Values.replicaCount }}' },
      { name: 'image.repository', file: FILE, line: 5, fullText: '{{ .Values.image.repository }}' },
      { name: 'image.tag', file: FILE, line: 5, fullText: '{{.Values.image.tag}}' },
    ]);
  });

  it('should accept hyphens, underscores, digits and brackets in paths', () => {
    const refs = extractReferences('{{ .Values.my-app_2.hosts[0] }}', FILE);

    expect(refs.map((r) => r.name)).toEqual(['my-app_2.hosts[0]']);
  });

  it('should ignore surrounding whitespace inside the braces', () => {
    const refs = extractReferences('{{    .Values.service.port\t}}', FILE);

    expect(refs).toHaveLength(1);
    expect(refs[0]?.name).toBe('service.port');
  });

  it('should keep one reference per occurrence', () => {
    const refs = extractReferences('{{ .Values.name }}\n{{ .Values.name }}\n', FILE);

    expect(refs.map((r) => r.line)).toEqual([1, 2]);
  });

  it('should ignore other template constructs', () => {
    const template = [
      '{{- if .Values.ingress.enabled }}',
      '{{ include "chart.fullname" . }}',
      '{{ .Values.image.tag | default .Chart.AppVersion }}',
      '{{- .Values.trimmed -}}',
      '{{ range .Values.hosts }}{{ . }}{{ end }}',
      '{{ .Release.Name }}',
      '{{- end }}',
    ].join('\n');

    expect(extractReferences(template, FILE)).toEqual([]);
  });

  it('should return an empty list for text without placeholders', () => {
    expect(extractReferences('', FILE)).toEqual([]);
    expect(extractReferences('kind: ConfigMap\ndata:\n  key: value\n', FILE)).toEqual([]);
  });

  it('should fail the whole file for an empty placeholder body', () => {
    const template = '{{ .Values.good }}\nvalue: {{ .Values. }}\n';

    expect(() => extractReferences(template, FILE)).toThrow(ParseError);
    expect(() => extractReferences(template, FILE)).toThrow('empty value reference: {{ .Values. }}');
  });

  it('should report where the empty placeholder is', () => {
    try {
      extractReferences('a: 1\nb: {{ .Values.  }}', FILE);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.source).toBe(FILE);
        expect(error.line).toBe(2);
        expect(error.column).toBe(4);
      }
    }
  });

  it('should be safe to call repeatedly on the same input', () => {
    const template = '{{ .Values.a }} {{ .Values.b }}';

    expect(extractReferences(template, FILE)).toEqual(extractReferences(template, FILE));
  });
});
