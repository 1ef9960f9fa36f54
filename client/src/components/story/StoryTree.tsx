import { useEffect, useMemo, useRef } from 'react';
import * as d3 from 'd3';
import { useStoryStore } from '@/store/storyStore';
import { formatPath } from '@branching-stories/shared';
import { initialView, layoutStory, type LayoutLink, type LayoutNode, type ViewTransform } from '@/utils/treeLayout';

const TOP_MARGIN = 50;

export default function StoryTree() {
  const { story, selectedPath, selectNode } = useStoryStore();
  const svgRef = useRef<SVGSVGElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  // Pan and zoom survive redraws of the same story
  const viewRef = useRef<ViewTransform | null>(null);

  const storyId = story?.id;
  const root = story?.root;
  const layout = useMemo(() => (root ? layoutStory(root) : null), [root]);
  const selectedKey = selectedPath ? formatPath(selectedPath) : null;

  useEffect(() => {
    viewRef.current = null;
  }, [storyId]);

  // Build and render the tree
  useEffect(() => {
    if (!svgRef.current || !containerRef.current || !layout) return;

    const svg = d3.select(svgRef.current);
    const width = containerRef.current.clientWidth;

    svg.selectAll('*').remove();

    // Arrow markers for tree and merge links
    svg.append('defs')
      .selectAll('marker')
      .data(['arrow', 'merge-arrow'])
      .join('marker')
      .attr('id', d => d)
      .attr('viewBox', '0 -5 10 10')
      .attr('refX', 10)
      .attr('refY', 0)
      .attr('markerWidth', 6)
      .attr('markerHeight', 6)
      .attr('orient', 'auto')
      .append('path')
      .attr('d', 'M0,-5L10,0L0,5')
      .attr('class', d => `${d}-head`);

    const mainGroup = svg.append('g');

    const zoomBehavior = d3.zoom<SVGSVGElement, unknown>()
      .scaleExtent([0.2, 3])
      .on('zoom', (event: d3.D3ZoomEvent<SVGSVGElement, unknown>) => {
        mainGroup.attr('transform', event.transform.toString());
        viewRef.current = { x: event.transform.x, y: event.transform.y, k: event.transform.k };
      });

    svg.call(zoomBehavior);

    const view = initialView(viewRef.current, layout.bounds, width, TOP_MARGIN);
    svg.call(zoomBehavior.transform, d3.zoomIdentity.translate(view.x, view.y).scale(view.k));

    mainGroup.append('g')
      .selectAll<SVGPathElement, LayoutLink>('path')
      .data(layout.links, d => d.key)
      .join('path')
      .attr('class', d => (d.kind === 'merge' ? 'merge-link' : 'link'))
      .attr('d', d => d.d)
      .attr('marker-end', d => (d.kind === 'merge' ? 'url(#merge-arrow)' : 'url(#arrow)'));

    const nodes = mainGroup.append('g')
      .selectAll<SVGGElement, LayoutNode>('g')
      .data(layout.nodes, d => d.key)
      .join('g')
      .attr('class', d => d.classes.join(' '))
      .classed('story-node', true)
      .attr('transform', d => `translate(${d.x},${d.y})`)
      .style('cursor', 'pointer')
      .on('click', (_event, d) => selectNode(d.path));

    nodes.append('title').text(d => d.node.name);
    nodes.append('circle').attr('r', 5);
    nodes.append('text')
      .attr('dy', -20)
      .attr('text-anchor', 'middle')
      .text(d => d.label);

    // Cleanup
    return () => {
      svg.on('.zoom', null);
    };
  }, [layout, selectNode]);

  // Highlight the selection without rebuilding the tree
  useEffect(() => {
    if (!svgRef.current || !layout) return;
    d3.select(svgRef.current)
      .selectAll<SVGGElement, LayoutNode>('g.story-node')
      .classed('selected-node', d => d.key === selectedKey);
  }, [layout, selectedKey]);

  return (
    <div className="tree-container" ref={containerRef}>
      <svg ref={svgRef} width="100%" height="100%" />
    </div>
  );
}
